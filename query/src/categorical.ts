/**
 * Categorical nodes
 *
 * Element-wise conversions between plain, unknown-category and
 * known-category columns. Discovering the categories is a tree reduction
 * (`GetCategories`); these nodes apply the result.
 */

import { ValidationError } from '@framegraph/core';
import {
  asUnknown,
  categorize,
  categoryCodes,
  describeValue,
  expectValue,
  isScalar,
  setCategories,
  type CategoryMap,
  type Scalar,
} from '@framegraph/frame';
import { Elemwise, Expr } from './expr.js';

function isCategoryMap(value: unknown): value is CategoryMap {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.values(value).every((categories) => Array.isArray(categories) && categories.every(isScalar))
  );
}

function isScalarList(value: unknown): value is Scalar[] {
  return Array.isArray(value) && value.every(isScalar);
}

/**
 * Convert columns to categoricals with known categories.
 */
export class Categorize extends Elemwise {
  static parameters = ['frame', 'categories'];

  get frame(): Expr {
    return this.exprOperand('frame');
  }

  get categories(): CategoryMap {
    const value = this.operand('categories');
    if (isCategoryMap(value)) return value;
    throw ValidationError.typeMismatch('Categorize.categories', 'a mapping of column to categories', describeValue(value));
  }

  protected operation(args: readonly unknown[]): unknown {
    return categorize(expectValue(args[0], 'Categorize'), this.categories);
  }
}

export class AsUnknown extends Elemwise {
  static parameters = ['frame'];

  protected operation(args: readonly unknown[]): unknown {
    return asUnknown(expectValue(args[0], 'AsUnknown'));
  }
}

export class SetCategories extends Elemwise {
  static parameters = ['frame', 'categories'];

  get categories(): Scalar[] {
    const value = this.operand('categories');
    if (isScalarList(value)) return value;
    throw ValidationError.typeMismatch('SetCategories.categories', 'a list of scalars', describeValue(value));
  }

  protected operation(args: readonly unknown[]): unknown {
    return setCategories(expectValue(args[0], 'SetCategories'), this.categories);
  }
}

/**
 * Integer codes of a known-category series. Building the node fails when
 * the categories are unknown.
 */
export class CategoryCodes extends Elemwise {
  static parameters = ['frame'];

  protected operation(args: readonly unknown[]): unknown {
    return categoryCodes(expectValue(args[0], 'CategoryCodes'));
  }
}
