/**
 * @framegraph/config - Configuration Factory Functions
 *
 * @packageDocumentation
 */

import { LogLevels, createConsoleLogger, type LogEntry, type LogLevel, type Logger } from '@framegraph/core';
import type { FrameGraphConfig, DeepPartial, EnvConfigOptions, LogFormat } from './types.js';
import { DEFAULT_CONFIG } from './defaults.js';

/**
 * Overlay the defined fields of `source` on `target`. Undefined values
 * never override.
 */
function mergeSection<T extends object>(target: T, source: Partial<T> | null | undefined): T {
  const result = { ...target };
  if (!source) {
    return result;
  }
  for (const key in source) {
    const value = source[key];
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

function mergePartialSection<T extends object>(
  target: Partial<T> | undefined,
  source: Partial<T> | undefined
): Partial<T> | undefined {
  if (source === undefined) return target;
  return mergeSection<Partial<T>>(target ?? {}, source);
}

/**
 * Create a complete, frozen FrameGraphConfig with optional overrides.
 *
 * @param overrides - Partial configuration to merge with `base`
 * @param base - Configuration to build on (defaults to DEFAULT_CONFIG)
 *
 * @example
 * ```typescript
 * const config = createConfig({ reduction: { splitEvery: 4 } });
 * const noFusion = createConfig({ optimizer: { fuse: false } }, config);
 * ```
 */
export function createConfig(
  overrides?: DeepPartial<FrameGraphConfig>,
  base: FrameGraphConfig = DEFAULT_CONFIG
): FrameGraphConfig {
  return Object.freeze({
    optimizer: Object.freeze(mergeSection(base.optimizer, overrides?.optimizer)),
    reduction: Object.freeze(mergeSection(base.reduction, overrides?.reduction)),
    io: Object.freeze(mergeSection(base.io, overrides?.io)),
    observability: Object.freeze(mergeSection(base.observability, overrides?.observability)),
  });
}

/**
 * Merge partial configurations; later ones take precedence.
 *
 * @example
 * ```typescript
 * const merged = mergeConfigs({ reduction: { splitEvery: 4 } }, { reduction: { splitOut: 2 } });
 * // merged.reduction → { splitEvery: 4, splitOut: 2 }
 * ```
 */
export function mergeConfigs(
  ...configs: Array<DeepPartial<FrameGraphConfig> | null | undefined>
): DeepPartial<FrameGraphConfig> {
  let result: DeepPartial<FrameGraphConfig> = {};
  for (const config of configs) {
    if (!config) continue;
    const optimizer = mergePartialSection(result.optimizer, config.optimizer);
    const reduction = mergePartialSection(result.reduction, config.reduction);
    const io = mergePartialSection(result.io, config.io);
    const observability = mergePartialSection(result.observability, config.observability);
    result = {
      ...(optimizer && { optimizer }),
      ...(reduction && { reduction }),
      ...(io && { io }),
      ...(observability && { observability }),
    };
  }
  return result;
}

// =============================================================================
// Environment
// =============================================================================

function getEnvVar(
  env: Record<string, string | undefined>,
  prefix: string,
  ...parts: string[]
): string | undefined {
  return env[[prefix, ...parts].join('_').toUpperCase()];
}

function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const num = Number(value);
  return Number.isNaN(num) ? undefined : num;
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  return normalized === 'true' || normalized === '1';
}

function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  return LogLevels.isLogLevel(normalized) ? normalized : undefined;
}

const LOG_FORMATS: readonly LogFormat[] = ['json', 'pretty'];

function parseLogFormat(value: string | undefined): LogFormat | undefined {
  return LOG_FORMATS.find((format) => format === value?.trim().toLowerCase());
}

/**
 * Create configuration from environment variables.
 *
 * Variables follow the pattern FRAMEGRAPH_<SECTION>_<FIELD>:
 * - FRAMEGRAPH_OPTIMIZER_FUSE=false
 * - FRAMEGRAPH_OPTIMIZER_MAX_PASSES=50
 * - FRAMEGRAPH_REDUCTION_SPLIT_EVERY=16
 * - FRAMEGRAPH_IO_STATISTICS_CACHE_SIZE=64
 * - FRAMEGRAPH_OBSERVABILITY_LOG_LEVEL=debug
 *
 * Unparseable values are ignored and the default is kept.
 *
 * @example
 * ```typescript
 * const config = getConfigFromEnv({ env: { FRAMEGRAPH_REDUCTION_SPLIT_EVERY: '4' } });
 * config.reduction.splitEvery; // 4
 * ```
 */
export function getConfigFromEnv(options: EnvConfigOptions = {}): FrameGraphConfig {
  const prefix = options.prefix ?? 'FRAMEGRAPH';
  const env = options.env ?? process.env;
  const read = (...parts: string[]): string | undefined => getEnvVar(env, prefix, ...parts);

  return createConfig({
    optimizer: {
      fuse: parseBoolean(read('OPTIMIZER', 'FUSE')),
      combineSimilar: parseBoolean(read('OPTIMIZER', 'COMBINE', 'SIMILAR')),
      maxPasses: parseNumber(read('OPTIMIZER', 'MAX', 'PASSES')),
    },
    reduction: {
      splitEvery: parseNumber(read('REDUCTION', 'SPLIT', 'EVERY')),
      splitOut: parseNumber(read('REDUCTION', 'SPLIT', 'OUT')),
    },
    io: {
      statisticsCacheSize: parseNumber(read('IO', 'STATISTICS', 'CACHE', 'SIZE')),
      calculateDivisions: parseBoolean(read('IO', 'CALCULATE', 'DIVISIONS')),
    },
    observability: {
      logLevel: parseLogLevel(read('OBSERVABILITY', 'LOG', 'LEVEL')),
      logFormat: parseLogFormat(read('OBSERVABILITY', 'LOG', 'FORMAT')),
    },
  });
}

/**
 * Console logger honouring `observability.logLevel` and `logFormat`.
 * `output` replaces the console, for capturing lines.
 *
 * @example
 * ```typescript
 * const logger = createConfiguredLogger(getConfigFromEnv());
 * ```
 */
export function createConfiguredLogger(
  config: FrameGraphConfig = DEFAULT_CONFIG,
  output?: (line: string, entry: LogEntry) => void
): Logger {
  const { logLevel, logFormat } = config.observability;
  return createConsoleLogger({ minLevel: logLevel, format: logFormat, write: output });
}
