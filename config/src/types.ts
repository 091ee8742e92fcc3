/**
 * @framegraph/config - Type Definitions
 *
 * Configuration schema for the planner, reductions, IO and logging.
 *
 * Naming Conventions:
 * - All counts: max*, *Size
 * - Booleans read as features: fuse, combineSimilar, calculateDivisions
 *
 * @packageDocumentation
 * @module @framegraph/config
 */

import type { LogLevel } from '@framegraph/core';

// =============================================================================
// Utility Types
// =============================================================================

/**
 * Deep partial type that makes all nested properties optional.
 */
export type DeepPartial<T> = T extends object
  ? { [P in keyof T]?: DeepPartial<T[P]> }
  : T;

// =============================================================================
// Optimizer Configuration
// =============================================================================

/**
 * Rewrite engine configuration.
 *
 * @example
 * ```typescript
 * const optimizer: OptimizerConfig = { fuse: true, combineSimilar: true, maxPasses: 100 };
 * ```
 */
export interface OptimizerConfig {
  /** Collapse single-consumer block-wise chains into fused tasks */
  fuse: boolean;

  /** Merge reads of the same source into one read of the column union */
  combineSimilar: boolean;

  /** Upper bound on simplification passes before giving up */
  maxPasses: number;
}

// =============================================================================
// Reduction Configuration
// =============================================================================

export interface ReductionConfig {
  /** Maximum inputs per combine task */
  splitEvery: number;

  /** Output partitions of a reduction */
  splitOut: number;
}

// =============================================================================
// IO Configuration
// =============================================================================

export interface IoConfig {
  /** Plans kept per dataset wrapper */
  statisticsCacheSize: number;

  /** Infer divisions from index statistics when reading datasets */
  calculateDivisions: boolean;
}

// =============================================================================
// Observability Configuration
// =============================================================================

export type LogFormat = 'json' | 'pretty';

export interface ObservabilityConfig {
  /** Minimum log level */
  logLevel: LogLevel;

  /** Log output format */
  logFormat: LogFormat;
}

// =============================================================================
// Unified Configuration
// =============================================================================

/**
 * Complete framegraph configuration.
 *
 * @example
 * ```typescript
 * const config: FrameGraphConfig = {
 *   optimizer: { fuse: true, combineSimilar: true, maxPasses: 100 },
 *   reduction: { splitEvery: 8, splitOut: 1 },
 *   io: { statisticsCacheSize: 32, calculateDivisions: true },
 *   observability: { logLevel: 'info', logFormat: 'json' },
 * };
 * ```
 */
export interface FrameGraphConfig {
  optimizer: OptimizerConfig;
  reduction: ReductionConfig;
  io: IoConfig;
  observability: ObservabilityConfig;
}

// =============================================================================
// Validation Types
// =============================================================================

export interface ConfigValidationError {
  /** Path to the invalid field (e.g., 'reduction.splitEvery') */
  path: string;
  message: string;
  value: unknown;
  suggestion?: string;
}

export interface ConfigValidationWarning {
  path: string;
  message: string;
  value: unknown;
  recommendation?: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ConfigValidationError[];
  warnings: ConfigValidationWarning[];
}

// =============================================================================
// Environment Configuration Types
// =============================================================================

export interface EnvConfigOptions {
  /** Environment variable prefix (default: 'FRAMEGRAPH') */
  prefix?: string;

  /** Custom environment object (default: process.env) */
  env?: Record<string, string | undefined>;
}
