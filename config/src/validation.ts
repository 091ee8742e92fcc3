/**
 * @framegraph/config - Configuration Validation
 *
 * @packageDocumentation
 */

import { ConfigError } from '@framegraph/core';
import type {
  FrameGraphConfig,
  ValidationResult,
  ConfigValidationError,
  ConfigValidationWarning,
} from './types.js';

const isPositiveInteger = (value: number): boolean => Number.isInteger(value) && value > 0;

/**
 * Validate a complete FrameGraphConfig.
 *
 * @example
 * ```typescript
 * const result = validateConfig(createConfig({ reduction: { splitEvery: 1 } }));
 * result.valid; // false
 * result.errors[0].path; // 'reduction.splitEvery'
 * ```
 */
export function validateConfig(config: FrameGraphConfig): ValidationResult {
  const errors: ConfigValidationError[] = [];
  const warnings: ConfigValidationWarning[] = [];

  validateOptimizerConfig(config.optimizer, errors, warnings);
  validateReductionConfig(config.reduction, errors, warnings);
  validateIoConfig(config.io, errors);

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

function validateOptimizerConfig(
  optimizer: FrameGraphConfig['optimizer'],
  errors: ConfigValidationError[],
  warnings: ConfigValidationWarning[]
): void {
  if (!isPositiveInteger(optimizer.maxPasses)) {
    errors.push({
      path: 'optimizer.maxPasses',
      message: 'Max passes must be a positive integer',
      value: optimizer.maxPasses,
    });
  } else if (optimizer.maxPasses < 10) {
    warnings.push({
      path: 'optimizer.maxPasses',
      message: 'Few simplification passes may stop before deep trees settle',
      value: optimizer.maxPasses,
      recommendation: 'Use at least 10 passes',
    });
  }
}

function validateReductionConfig(
  reduction: FrameGraphConfig['reduction'],
  errors: ConfigValidationError[],
  warnings: ConfigValidationWarning[]
): void {
  if (!Number.isInteger(reduction.splitEvery) || reduction.splitEvery < 2) {
    errors.push({
      path: 'reduction.splitEvery',
      message: 'splitEvery must be an integer of at least 2',
      value: reduction.splitEvery,
      suggestion: 'A combine step with fewer than 2 inputs never reduces the partition count',
    });
  } else if (reduction.splitEvery > 1024) {
    warnings.push({
      path: 'reduction.splitEvery',
      message: 'Very wide combine tasks hold many intermediates in memory at once',
      value: reduction.splitEvery,
      recommendation: 'Keep splitEvery in the tens',
    });
  }

  if (!isPositiveInteger(reduction.splitOut)) {
    errors.push({
      path: 'reduction.splitOut',
      message: 'splitOut must be a positive integer',
      value: reduction.splitOut,
    });
  }
}

function validateIoConfig(io: FrameGraphConfig['io'], errors: ConfigValidationError[]): void {
  if (!isPositiveInteger(io.statisticsCacheSize)) {
    errors.push({
      path: 'io.statisticsCacheSize',
      message: 'Statistics cache size must be a positive integer',
      value: io.statisticsCacheSize,
    });
  }
}

/**
 * Throw a ConfigError listing every validation error.
 */
export function assertValidConfig(config: FrameGraphConfig): FrameGraphConfig {
  const result = validateConfig(config);
  if (!result.valid) {
    throw new ConfigError(
      `Invalid configuration: ${result.errors.map((e) => e.path).join(', ')}`,
      result.errors.map((e) => `${e.path}: ${e.message}`)
    );
  }
  return config;
}
