/**
 * Catalog Import Types
 */

import type { Coin } from '../catalog/catalog-types.js';
import type { HistoryImportEntry } from '../ownership/ownership-types.js';

/** Same coin id already in the catalog with a different feature */
export interface CoinConflict {
  incoming: Coin;
  existing: Coin;
}

export interface CoinClassification {
  new: Coin[];
  /** Same id and same feature as the stored coin; safe to ignore */
  duplicate: Coin[];
  /** Needs manual resolution; never overwritten */
  conflict: CoinConflict[];
}

export interface HistoryClassification {
  new: HistoryImportEntry[];
  /** Same (name, coin id, date to the second) as a stored event or an earlier row */
  duplicate: HistoryImportEntry[];
}
