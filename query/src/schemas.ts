/**
 * @framegraph/query - Reader Boundary Schemas
 *
 * Zod schemas for what crosses into the planner from outside: the manifest
 * and fragment statistics a storage reader reports, and user-supplied
 * filter predicates.
 *
 * @example
 * ```typescript
 * const filters = validate(FilterListSchema, [['a', '>=', 8]], 'filters');
 * isFilterPredicateList([['a', '~', 1]]); // false
 * ```
 *
 * @module schemas
 */

import { z } from 'zod';
import { ErrorCode, ValidationError } from '@framegraph/core';
import type { DType, Scalar } from '@framegraph/frame';
import type { FilterOperator, FilterPredicate } from './types.js';

// =============================================================================
// Values
// =============================================================================

export const ScalarSchema: z.ZodType<Scalar> = z.union([z.number(), z.string(), z.boolean(), z.null()]);

export const DTypeSchema: z.ZodType<DType> = z.enum(['int64', 'float64', 'bool', 'string', 'category', 'object']);

// =============================================================================
// Filters
// =============================================================================

export const FilterOperatorSchema: z.ZodType<FilterOperator> = z.enum(['==', '!=', '<', '<=', '>', '>=']);

export const FilterPredicateSchema = z.tuple([z.string().min(1), FilterOperatorSchema, ScalarSchema]).readonly();

export const FilterListSchema = z.array(FilterPredicateSchema);

export function isFilterPredicateList(value: unknown): value is FilterPredicate[] {
  return FilterListSchema.safeParse(value).success;
}

// =============================================================================
// Reader Output
// =============================================================================

export const ColumnStatisticsSchema = z.object({
  min: ScalarSchema,
  max: ScalarSchema,
  nullCount: z.number().int().nonnegative(),
});

export const FragmentInfoSchema = z.object({
  id: z.string(),
  rowCount: z.number().int().nonnegative(),
  columns: z.record(ColumnStatisticsSchema),
  index: ColumnStatisticsSchema.optional(),
});

export const DatasetManifestSchema = z
  .object({
    columns: z.array(z.string()),
    dtypes: z.record(DTypeSchema),
    indexName: z.string().nullable(),
  })
  .refine((manifest) => manifest.columns.every((name) => name in manifest.dtypes), {
    message: 'Every column needs a dtype',
    path: ['dtypes'],
  });

// =============================================================================
// Validation
// =============================================================================

/**
 * Parse `value` with `schema`.
 *
 * @throws ValidationError listing each issue by path
 */
export function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, what: string): T {
  const result = schema.safeParse(value);
  if (result.success) return result.data;
  const issues = result.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }));
  throw new ValidationError(
    `Invalid ${what}: ${issues.map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message)).join('; ')}`,
    ErrorCode.VALIDATION_ERROR,
    { issues }
  );
}
