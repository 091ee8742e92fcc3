/**
 * In-memory storage reader
 *
 * Serves a list of frames as dataset fragments, computing the statistics a
 * file format would record in its footer. Reads are logged so tests can see
 * which fragments and columns were touched.
 *
 * @example
 * ```typescript
 * const reader = new InMemoryReader('sales', [january, february]);
 * const dataset = new Dataset(reader);
 * await dataset.readFragment(reader.fragments()[0], ['amount'], []);
 * reader.reads; // [{ fragment: 'sales/0', columns: ['amount'] }]
 * ```
 */

import { ValidationError } from '@framegraph/core';
import { DataFrame, compareScalars, type Scalar } from '@framegraph/frame';
import { applyFilters, type ColumnStatistics, type DatasetManifest, type FragmentInfo, type ReadOptions, type StorageReader } from './dataset.js';

export interface InMemoryReaderOptions {
  /** Record index statistics for each fragment (default: true) */
  indexStatistics?: boolean;
}

export interface ReadRecord {
  fragment: string;
  columns: readonly string[] | null;
}

/**
 * Min, max and null count of `values`.
 */
export function computeStatistics(values: readonly Scalar[]): ColumnStatistics {
  let min: Scalar = null;
  let max: Scalar = null;
  let nullCount = 0;
  for (const value of values) {
    if (value === null) {
      nullCount++;
      continue;
    }
    if (min === null || compareScalars(value, min) < 0) min = value;
    if (max === null || compareScalars(value, max) > 0) max = value;
  }
  return { min, max, nullCount };
}

export class InMemoryReader implements StorageReader {
  readonly reads: ReadRecord[] = [];
  private readonly frames: ReadonlyMap<string, DataFrame>;
  private readonly fragmentList: readonly FragmentInfo[];

  constructor(readonly id: string, frames: readonly DataFrame[], options: InMemoryReaderOptions = {}) {
    if (frames.length === 0) {
      throw ValidationError.typeMismatch('InMemoryReader', 'at least one frame', 'none');
    }
    const indexStatistics = options.indexStatistics ?? true;
    const byId = new Map<string, DataFrame>();
    this.fragmentList = frames.map((frame, i) => {
      const fragmentId = `${id}/${i}`;
      byId.set(fragmentId, frame);
      const columns: Record<string, ColumnStatistics> = {};
      for (const name of frame.columns) {
        columns[name] = computeStatistics(frame.columnData(name).values);
      }
      const info: FragmentInfo = { id: fragmentId, rowCount: frame.length, columns };
      return indexStatistics ? { ...info, index: computeStatistics(frame.index) } : info;
    });
    this.frames = byId;
  }

  manifest(): DatasetManifest {
    const [first] = this.frames.values();
    return { columns: [...first.columns], dtypes: first.dtypes(), indexName: first.indexName };
  }

  fragments(): readonly FragmentInfo[] {
    return this.fragmentList;
  }

  async read(fragment: FragmentInfo, options: ReadOptions): Promise<DataFrame> {
    const frame = this.frames.get(fragment.id);
    if (frame === undefined) {
      throw ValidationError.typeMismatch('InMemoryReader.read', `a fragment of ${this.id}`, fragment.id);
    }
    this.reads.push({ fragment: fragment.id, columns: options.columns });
    const filtered = applyFilters(frame, options.filters);
    const columns = options.columns ?? filtered.columns;
    return filtered.withColumns(columns.map((name) => [name, filtered.columnData(name)] as const));
  }
}
