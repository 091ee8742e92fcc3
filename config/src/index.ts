/**
 * @framegraph/config - Configuration for the framegraph planner
 *
 * - Deep partial overrides with createConfig()
 * - Environment variable support with getConfigFromEnv()
 * - Validation with clear error messages
 *
 * @example
 * ```typescript
 * import { createConfig, validateConfig, getConfigFromEnv } from '@framegraph/config';
 *
 * const config = createConfig({ reduction: { splitEvery: 16 } });
 * const envConfig = getConfigFromEnv();
 * const result = validateConfig(config);
 * ```
 *
 * @packageDocumentation
 * @module @framegraph/config
 */

export type {
  DeepPartial,
  OptimizerConfig,
  ReductionConfig,
  IoConfig,
  LogFormat,
  ObservabilityConfig,
  FrameGraphConfig,
  ConfigValidationError,
  ConfigValidationWarning,
  ValidationResult,
  EnvConfigOptions,
} from './types.js';

export { DEFAULT_CONFIG } from './defaults.js';
export { createConfig, mergeConfigs, getConfigFromEnv, createConfiguredLogger } from './config.js';
export { validateConfig, assertValidConfig } from './validation.js';
