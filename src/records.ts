/**
 * @fileoverview Access record model and the field accessors every aggregator
 * reads through. Missing columns are normalised to the empty string here and
 * nowhere else.
 *
 * @module records
 */

/**
 * A single row of the access control log, keyed by CSV column name.
 * Any column may be absent or empty.
 */
export type AccessRecord = Readonly<Record<string, string | undefined>>;

/** CSV column names read by the report generators. */
export const COLUMNS = {
  /** Source of the unit identifier ("unit number") */
  unit: 'CardFirstName',
  cardBatch: 'CardBatch',
  cardNumber: 'CardNumber',
  accessTimestamp: 'AccessTimestamp',
  /** Building-side unit id, only used for consistency checks */
  unitId: 'UnitID',
} as const;

/** Separator between card batch and card number in a fob id. */
export const CREDENTIAL_SEPARATOR = '-';

/**
 * Reads a column from a record, trimmed.
 *
 * @param record - Record to read from
 * @param column - CSV column name
 * @returns The trimmed value, or an empty string when the column is missing
 */
export function readField(record: AccessRecord, column: string): string {
  const value = record[column];
  return typeof value === 'string' ? value.trim() : '';
}

/**
 * Returns the unit identifier of a record. An empty string means the record
 * belongs to no unit and is excluded from every report.
 */
export function unitIdentifier(record: AccessRecord): string {
  return readField(record, COLUMNS.unit);
}

/**
 * Builds the fob id (`CardBatch-CardNumber`) of a record.
 *
 * @example
 * ```typescript
 * credentialId({ CardBatch: '210', CardNumber: '54321' }); // '210-54321'
 * credentialId({ CardNumber: '54321' });                   // '-54321'
 * ```
 */
export function credentialId(record: AccessRecord): string {
  const batch = readField(record, COLUMNS.cardBatch);
  const number = readField(record, COLUMNS.cardNumber);
  return `${batch}${CREDENTIAL_SEPARATOR}${number}`;
}

/**
 * Orders two strings by Unicode code point.
 *
 * @remarks
 * `Array.prototype.sort` compares UTF-16 code units, which puts characters
 * outside the Basic Multilingual Plane before `U+E000`-`U+FFFF`. Comparing
 * code points gives the same order as comparing the UTF-8 bytes.
 */
export function compareCodePoints(a: string, b: string): number {
  const left = Array.from(a, (ch) => ch.codePointAt(0) ?? 0);
  const right = Array.from(b, (ch) => ch.codePointAt(0) ?? 0);
  const length = Math.min(left.length, right.length);
  for (let i = 0; i < length; i += 1) {
    if (left[i] !== right[i]) {
      return left[i] - right[i];
    }
  }
  return left.length - right.length;
}
