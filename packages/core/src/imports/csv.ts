/**
 * CSV codec for catalog and history uploads/exports
 *
 * Coin files:    type,year,country,series,value,id,image,feature,volume
 * History files: name,id,date   (date as YYYY-MM-DD HH:MM:SS, UTC)
 *
 * Headers are validated before any row; rows are validated individually and
 * reported with their line number.
 */

import { CsvError } from 'csv-parse';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import { MAX_COIN_VALUE } from '@eurocoin/types';
import { isCoinType, type Coin } from '../catalog/catalog-types.js';
import type { CurrentOwnership, HistoryImportEntry } from '../ownership/ownership-types.js';
import { InvalidCsvRowError, MalformedCsvError, MissingCsvHeadersError } from './import-errors.js';

export const COIN_CSV_HEADERS = [
  'type',
  'year',
  'country',
  'series',
  'value',
  'id',
  'image',
  'feature',
  'volume',
] as const;

export const HISTORY_CSV_HEADERS = ['name', 'id', 'date'] as const;

const HISTORY_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2})(?::(\d{2}))?)?$/;

const ParsedRowsSchema = z.array(
  z.object({
    record: z.array(z.string()),
    info: z.object({ lines: z.number() }),
  })
);

export interface CsvRecord {
  /** 1-based line of the record in the uploaded file */
  line: number;
  fields: Record<string, string>;
}

/**
 * Parse CSV text into header-keyed records
 *
 * @throws MalformedCsvError if the text is not valid CSV
 * @throws MissingCsvHeadersError listing every required header that is absent
 */
export function readCsvRecords(text: string, requiredHeaders: readonly string[]): CsvRecord[] {
  let parsed: unknown;
  try {
    parsed = parse(text, {
      bom: true,
      trim: true,
      skip_empty_lines: true,
      relax_column_count: true,
      info: true,
    });
  } catch (error) {
    if (error instanceof CsvError) {
      throw new MalformedCsvError(error.message, { cause: error });
    }
    throw error;
  }

  const [headerRow, ...dataRows] = ParsedRowsSchema.parse(parsed);
  const headers = (headerRow?.record ?? []).map((header) => header.trim().toLowerCase());

  const missing = requiredHeaders.filter((header) => !headers.includes(header));
  if (missing.length > 0) {
    throw new MissingCsvHeadersError(missing);
  }

  return dataRows.map((row) => {
    const fields: Record<string, string> = {};
    headers.forEach((header, index) => {
      fields[header] = row.record[index] ?? '';
    });
    return { line: row.info.lines, fields };
  });
}

function field(record: CsvRecord, name: string): string {
  return (record.fields[name] ?? '').trim();
}

function requiredField(record: CsvRecord, name: string): string {
  const value = field(record, name);
  if (value === '') {
    throw new InvalidCsvRowError(record.line, `${name} is required`);
  }
  return value;
}

function optionalField(record: CsvRecord, name: string): string | null {
  const value = field(record, name);
  return value === '' ? null : value;
}

/**
 * @throws InvalidCsvRowError if a field is missing or malformed
 */
export function parseCoinRecord(record: CsvRecord): Coin {
  const typeText = requiredField(record, 'type');
  const coinType = typeText.toUpperCase();
  if (!isCoinType(coinType)) {
    throw new InvalidCsvRowError(record.line, `type must be RE or CC, got "${typeText}"`);
  }

  const yearText = requiredField(record, 'year');
  if (!/^\d{4}$/.test(yearText)) {
    throw new InvalidCsvRowError(record.line, `year must be a four-digit year, got "${yearText}"`);
  }

  const valueText = requiredField(record, 'value');
  // Checked after rounding to cents, the precision the store keeps
  const value = Math.round(Number(valueText) * 100) / 100;
  if (!Number.isFinite(value) || value <= 0 || value >= MAX_COIN_VALUE) {
    throw new InvalidCsvRowError(
      record.line,
      `value must be a positive number below ${MAX_COIN_VALUE}, got "${valueText}"`
    );
  }

  return {
    coinId: requiredField(record, 'id'),
    coinType,
    year: Number(yearText),
    country: requiredField(record, 'country'),
    series: requiredField(record, 'series'),
    value,
    imageUrl: optionalField(record, 'image'),
    feature: optionalField(record, 'feature'),
    volume: optionalField(record, 'volume'),
  };
}

/**
 * Parse `YYYY-MM-DD HH:MM:SS` (also with a `T` separator, without seconds, or a
 * bare date meaning midnight) as UTC
 *
 * @returns null when the text is not a valid calendar date and time
 */
export function parseHistoryDate(text: string): Date | null {
  const match = HISTORY_DATE_PATTERN.exec(text.trim());
  if (!match) {
    return null;
  }

  const [, year = '', month = '', day = '', hour = '0', minute = '0', second = '0'] = match;
  const parts = {
    year: Number(year),
    month: Number(month),
    day: Number(day),
    hour: Number(hour),
    minute: Number(minute),
    second: Number(second),
  };

  const date = new Date(
    Date.UTC(parts.year, parts.month - 1, parts.day, parts.hour, parts.minute, parts.second)
  );

  const roundTrips =
    date.getUTCFullYear() === parts.year &&
    date.getUTCMonth() === parts.month - 1 &&
    date.getUTCDate() === parts.day &&
    date.getUTCHours() === parts.hour &&
    date.getUTCMinutes() === parts.minute &&
    date.getUTCSeconds() === parts.second;

  return roundTrips ? date : null;
}

export function formatHistoryDate(date: Date): string {
  return date.toISOString().slice(0, 19).replace('T', ' ');
}

/**
 * @throws InvalidCsvRowError if a field is missing or the date is unparseable
 */
export function parseHistoryRecord(record: CsvRecord): HistoryImportEntry {
  const name = requiredField(record, 'name');
  const coinId = requiredField(record, 'id');
  const dateText = requiredField(record, 'date');

  const date = parseHistoryDate(dateText);
  if (!date) {
    throw new InvalidCsvRowError(
      record.line,
      `date must use the YYYY-MM-DD HH:MM:SS format, got "${dateText}"`
    );
  }

  return { name, coinId, date };
}

export function parseCoinCsv(text: string): Coin[] {
  return readCsvRecords(text, COIN_CSV_HEADERS).map(parseCoinRecord);
}

export function parseHistoryCsv(text: string): HistoryImportEntry[] {
  return readCsvRecords(text, HISTORY_CSV_HEADERS).map(parseHistoryRecord);
}

export function serializeCoinsCsv(coins: readonly Coin[]): string {
  return stringify([
    [...COIN_CSV_HEADERS],
    ...coins.map((coin) => [
      coin.coinType,
      String(coin.year),
      coin.country,
      coin.series,
      coin.value.toFixed(2),
      coin.coinId,
      coin.imageUrl ?? '',
      coin.feature ?? '',
      coin.volume ?? '',
    ]),
  ]);
}

export function serializeHistoryCsv(ownerships: readonly CurrentOwnership[]): string {
  return stringify([
    [...HISTORY_CSV_HEADERS],
    ...ownerships.map((ownership) => [ownership.name, ownership.coinId, formatHistoryDate(ownership.date)]),
  ]);
}
