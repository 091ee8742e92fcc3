/**
 * @framegraph/config - Default Configuration Values
 *
 * @packageDocumentation
 */

import type { FrameGraphConfig } from './types.js';

const DEFAULT_OPTIMIZER_CONFIG = {
  fuse: true,
  combineSimilar: true,
  maxPasses: 100,
} as const;

const DEFAULT_REDUCTION_CONFIG = {
  splitEvery: 8,
  splitOut: 1,
} as const;

const DEFAULT_IO_CONFIG = {
  statisticsCacheSize: 32,
  calculateDivisions: true,
} as const;

const DEFAULT_OBSERVABILITY_CONFIG = {
  logLevel: 'info' as const,
  logFormat: 'json' as const,
} as const;

/**
 * Default configuration.
 *
 * @example
 * ```typescript
 * import { DEFAULT_CONFIG, createConfig } from '@framegraph/config';
 *
 * console.log(DEFAULT_CONFIG.reduction.splitEvery); // 8
 * const config = createConfig({ optimizer: { fuse: false } });
 * ```
 */
export const DEFAULT_CONFIG: FrameGraphConfig = Object.freeze({
  optimizer: Object.freeze({ ...DEFAULT_OPTIMIZER_CONFIG }),
  reduction: Object.freeze({ ...DEFAULT_REDUCTION_CONFIG }),
  io: Object.freeze({ ...DEFAULT_IO_CONFIG }),
  observability: Object.freeze({ ...DEFAULT_OBSERVABILITY_CONFIG }),
});
