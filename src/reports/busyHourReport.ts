/**
 * @fileoverview Busiest-hour report: for each unit, the hour(s) of day with
 * the most recorded accesses. Minutes are not kept; accesses are bucketed by
 * hour only.
 *
 * @module reports/busyHourReport
 */

import { COLUMNS, compareCodePoints, readField, unitIdentifier, type AccessRecord } from '../records';
import { incrementFrequency, keysWithMaxCount, type Frequency } from '../utils/frequency';
import { parseAccessTimestamp } from '../utils/time';

/** First line of every busy-hour report, present even when no unit qualifies. */
export const BUSY_HOUR_REPORT_HEADER = 'Unit Number (First Name),Busiest Time(s) (Hour:Minute)';

/** Separator between tied hours within one unit's cell. */
export const HOUR_SEPARATOR = '; ';

/**
 * Access counts per hour of day (0-23) for each unit.
 */
export type UnitHourHistograms = Map<string, Frequency<number>>;

/**
 * Counts accesses per unit and hour of day.
 *
 * @param records - Loaded access records; never mutated
 * @returns Map of unit identifier to its hour histogram
 *
 * @remarks
 * A record needs both a unit identifier and a valid `YYYY-MM-DDTHH:MM:SS`
 * timestamp to be counted. The timestamp is read through {@link readField},
 * so surrounding whitespace is trimmed before the exact-shape match; anything
 * else around or inside it fails the match. A unit whose timestamps all fail to parse gets no
 * histogram and so no report row, even though it does appear in the fob
 * report.
 */
export function buildUnitHourHistograms(records: Iterable<AccessRecord>): UnitHourHistograms {
  const histograms: UnitHourHistograms = new Map();
  for (const record of records) {
    const unit = unitIdentifier(record);
    if (!unit) {
      continue;
    }

    const accessTime = parseAccessTimestamp(readField(record, COLUMNS.accessTimestamp));
    if (!accessTime) {
      continue;
    }

    let histogram = histograms.get(unit);
    if (!histogram) {
      histogram = new Map();
      histograms.set(unit, histogram);
    }
    incrementFrequency(histogram, accessTime.hour);
  }
  return histograms;
}

/**
 * Returns every hour sharing the highest access count, ascending.
 *
 * @example
 * ```typescript
 * findBusiestHours(new Map([[14, 2], [8, 2], [9, 1]])); // [8, 14]
 * ```
 */
export function findBusiestHours(histogram: Frequency<number>): number[] {
  return keysWithMaxCount(histogram).sort((a, b) => a - b);
}

/**
 * Formats an hour bucket as `H:00`, without a leading zero.
 */
export function formatHour(hour: number): string {
  return `${hour}:00`;
}

/**
 * Renders unit hour histograms as CSV text, units in code-point order.
 */
export function renderBusyHourReport(histograms: UnitHourHistograms): string {
  const lines = [BUSY_HOUR_REPORT_HEADER];
  const units = [...histograms.keys()].sort(compareCodePoints);
  for (const unit of units) {
    const busiest = findBusiestHours(histograms.get(unit) ?? new Map());
    lines.push(`${unit},${busiest.map(formatHour).join(HOUR_SEPARATOR)}`);
  }
  return lines.join('\n');
}

/**
 * Builds the busiest-hour report for a set of records.
 *
 * @param records - Loaded access records
 * @returns Report text; header only when no record has both a unit and a valid timestamp
 */
export function generateBusyHourReport(records: Iterable<AccessRecord>): string {
  return renderBusyHourReport(buildUnitHourHistograms(records));
}
