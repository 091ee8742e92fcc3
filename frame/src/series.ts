/**
 * Immutable labelled column of scalars
 */

import { tokenize, ValidationError, type Tokenizable } from '@framegraph/core';
import { inferDType, rangeIndex, type DType, type Scalar } from './types.js';

export interface SeriesInit {
  index?: readonly Scalar[];
  name?: string | null;
  dtype?: DType;
  indexName?: string | null;
  /** Known categories of a `category` series; null when unknown */
  categories?: readonly Scalar[] | null;
}

export class Series implements Tokenizable {
  readonly values: readonly Scalar[];
  readonly index: readonly Scalar[];
  readonly name: string | null;
  readonly dtype: DType;
  readonly indexName: string | null;
  readonly categories: readonly Scalar[] | null;
  private token: string | undefined;

  constructor(values: readonly Scalar[], init: SeriesInit = {}) {
    const index = init.index ?? rangeIndex(values.length);
    if (index.length !== values.length) {
      throw ValidationError.lengthMismatch('Series', values.length, index.length);
    }
    this.values = Object.freeze([...values]);
    this.index = Object.freeze([...index]);
    this.name = init.name ?? null;
    this.dtype = init.dtype ?? inferDType(values);
    this.indexName = init.indexName ?? null;
    this.categories = this.dtype === 'category' && init.categories ? Object.freeze([...init.categories]) : null;
  }

  get length(): number {
    return this.values.length;
  }

  /** Whether this is a category series whose categories are known. */
  get knownCategories(): boolean {
    return this.dtype === 'category' && this.categories !== null;
  }

  /**
   * Copy with some fields replaced.
   */
  with(changes: SeriesInit & { values?: readonly Scalar[] }): Series {
    return new Series(changes.values ?? this.values, {
      index: changes.index ?? this.index,
      name: changes.name === undefined ? this.name : changes.name,
      dtype: changes.dtype ?? this.dtype,
      indexName: changes.indexName === undefined ? this.indexName : changes.indexName,
      categories: changes.categories === undefined ? this.categories : changes.categories,
    });
  }

  toArray(): Scalar[] {
    return [...this.values];
  }

  toToken(): string {
    if (this.token === undefined) {
      this.token = tokenize('series', this.name, this.dtype, this.categories, this.indexName, this.values, this.index);
    }
    return this.token;
  }

  toString(): string {
    return `Series(name=${this.name ?? 'None'}, dtype=${this.dtype}, length=${this.length})`;
  }
}
