import sampleMovies from '../../data/sampleMovies.json';
import type { Dataset } from '../types/dataset';
import type { RawCell } from './coerce';
import { buildDataset } from './dataset';

export const SAMPLE_DATASET_NAME = 'sample_movies';

/**
 * The built-in five-film dataset substituted when the real source is
 * unavailable. Column order and values are fixed.
 */
export function createSampleDataset(reason = 'built-in sample'): Dataset {
  const entries = Object.entries(sampleMovies);
  const header = entries.map(([name]) => name);
  const rowCount = Math.max(0, ...entries.map(([, values]) => values.length));

  const rows: RawCell[][] = [];
  for (let i = 0; i < rowCount; i++) {
    rows.push(entries.map(([, values]) => values[i] ?? null));
  }

  return buildDataset(SAMPLE_DATASET_NAME, header, rows, { type: 'synthetic', reason });
}
