/**
 * Imports Domain
 *
 * Exports the catalog/history import service, CSV codec, errors, and types.
 */

export { ImportService, historyEntryKey } from './import-service.js';
export type { ImportServiceOptions } from './import-service.js';

export {
  COIN_CSV_HEADERS,
  HISTORY_CSV_HEADERS,
  readCsvRecords,
  parseCoinCsv,
  parseCoinRecord,
  parseHistoryCsv,
  parseHistoryRecord,
  parseHistoryDate,
  formatHistoryDate,
  serializeCoinsCsv,
  serializeHistoryCsv,
} from './csv.js';
export type { CsvRecord } from './csv.js';

export {
  MissingCsvHeadersError,
  InvalidCsvRowError,
  MalformedCsvError,
  EmptySelectionError,
  DuplicateCoinInBatchError,
  CoinAlreadyExistsError,
} from './import-errors.js';

export type { CoinClassification, CoinConflict, HistoryClassification } from './import-types.js';
