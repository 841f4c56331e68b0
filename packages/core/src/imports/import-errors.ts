/**
 * Catalog Import Errors
 */

import { ConflictError, ValidationError } from '../shared/errors.js';

export class MissingCsvHeadersError extends ValidationError {
  readonly missing: string[];

  constructor(missing: string[]) {
    super(`Missing required CSV headers: ${missing.join(', ')}`);
    this.missing = missing;
  }
}

export class InvalidCsvRowError extends ValidationError {
  readonly line: number;

  constructor(line: number, reason: string) {
    super(`Invalid CSV row at line ${line}: ${reason}`);
    this.line = line;
  }
}

export class MalformedCsvError extends ValidationError {
  constructor(reason: string, options?: ErrorOptions) {
    super(`Malformed CSV: ${reason}`, options);
  }
}

export class EmptySelectionError extends ValidationError {
  constructor(message = 'Nothing selected for import') {
    super(message);
  }
}

export class DuplicateCoinInBatchError extends ValidationError {
  readonly coinIds: string[];

  constructor(coinIds: string[]) {
    super(`Coin ids repeated in the selection: ${coinIds.join(', ')}`);
    this.coinIds = coinIds;
  }
}

/**
 * Commit-time guard: a selected coin was imported after classification
 */
export class CoinAlreadyExistsError extends ConflictError {
  readonly coinIds: string[];

  constructor(coinIds: string[]) {
    super(`Coins already exist in the catalog: ${coinIds.join(', ')}`);
    this.coinIds = coinIds;
  }
}
