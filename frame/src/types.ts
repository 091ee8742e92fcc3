/**
 * Scalar and dtype model shared by Series and DataFrame
 */

export type Scalar = number | string | boolean | null;

export type DType = 'int64' | 'float64' | 'bool' | 'string' | 'category' | 'object';

export const DTYPES: readonly DType[] = ['int64', 'float64', 'bool', 'string', 'category', 'object'];

export function isDType(value: unknown): value is DType {
  return DTYPES.some((dtype) => dtype === value);
}

export function isScalar(value: unknown): value is Scalar {
  return (
    value === null ||
    typeof value === 'number' ||
    typeof value === 'string' ||
    typeof value === 'boolean'
  );
}

export function isNumericDType(dtype: DType): boolean {
  return dtype === 'int64' || dtype === 'float64' || dtype === 'bool';
}

export function scalarDType(value: Scalar): DType {
  switch (typeof value) {
    case 'number':
      return Number.isInteger(value) ? 'int64' : 'float64';
    case 'boolean':
      return 'bool';
    case 'string':
      return 'string';
    default:
      return 'object';
  }
}

/**
 * Infer a column dtype from its values; nulls do not vote.
 */
export function inferDType(values: readonly Scalar[]): DType {
  let result: DType | undefined;
  for (const value of values) {
    if (value === null) continue;
    const dtype = scalarDType(value);
    result = result === undefined ? dtype : unifyDTypes(result, dtype);
  }
  return result ?? 'object';
}

/**
 * Smallest dtype holding values of both `a` and `b`.
 */
export function unifyDTypes(a: DType, b: DType): DType {
  if (a === b) return a;
  if (isNumericDType(a) && isNumericDType(b)) {
    return a === 'float64' || b === 'float64' ? 'float64' : 'int64';
  }
  if ((a === 'string' && b === 'category') || (a === 'category' && b === 'string')) {
    return 'string';
  }
  return 'object';
}

const typeRank = (value: Scalar): number => {
  if (value === null) return 0;
  switch (typeof value) {
    case 'boolean':
      return 1;
    case 'number':
      return 2;
    default:
      return 3;
  }
};

/**
 * Total order over scalars: null < booleans < numbers < strings.
 * Used for sorting, divisions and statistics.
 */
export function compareScalars(a: Scalar, b: Scalar): number {
  const rankA = typeRank(a);
  const rankB = typeRank(b);
  if (rankA !== rankB) return rankA - rankB;
  if (a === null || b === null || a === b) return 0;
  if (typeof a === 'boolean' || typeof b === 'boolean') {
    return Number(a) - Number(b);
  }
  if (typeof a === 'number' && typeof b === 'number') {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  const left = String(a);
  const right = String(b);
  return left < right ? -1 : left > right ? 1 : 0;
}

export const rangeIndex = (length: number): number[] => Array.from({ length }, (_, i) => i);
