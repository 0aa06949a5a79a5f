/**
 * @fileoverview Unit-to-fob report: which credentials (fobs) were used by
 * each unit. Pure functions over already loaded records; writing the result
 * somewhere is left to the caller.
 *
 * @module reports/fobReport
 */

import { compareCodePoints, credentialId, unitIdentifier, type AccessRecord } from '../records';

/** First line of every fob report, present even when no unit qualifies. */
export const FOB_REPORT_HEADER = 'Unit Number (First Name),Fob IDs (CardBatch-CardNumber)';

/** Separator between fob ids within one unit's cell. */
export const FOB_ID_SEPARATOR = '; ';

/**
 * Distinct fob ids observed per unit.
 */
export type UnitFobSets = Map<string, Set<string>>;

/**
 * Groups fob ids by unit, dropping duplicates.
 *
 * @param records - Loaded access records; never mutated
 * @returns Map of unit identifier to the set of its fob ids
 *
 * @remarks
 * Records without a unit identifier are skipped. A missing batch or number
 * still produces an id (`-54321`, `210-`), so such a record does count for
 * its unit.
 */
export function buildUnitFobSets(records: Iterable<AccessRecord>): UnitFobSets {
  const unitFobs: UnitFobSets = new Map();
  for (const record of records) {
    const unit = unitIdentifier(record);
    if (!unit) {
      continue;
    }

    let fobs = unitFobs.get(unit);
    if (!fobs) {
      fobs = new Set();
      unitFobs.set(unit, fobs);
    }
    fobs.add(credentialId(record));
  }
  return unitFobs;
}

/**
 * Renders unit fob sets as CSV text, units and fob ids in code-point order.
 *
 * @example
 * ```typescript
 * renderFobReport(new Map([['unit104', new Set(['250-98765', '240-87654'])]]));
 * // 'Unit Number (First Name),Fob IDs (CardBatch-CardNumber)\nunit104,240-87654; 250-98765'
 * ```
 */
export function renderFobReport(unitFobs: UnitFobSets): string {
  const lines = [FOB_REPORT_HEADER];
  const units = [...unitFobs.keys()].sort(compareCodePoints);
  for (const unit of units) {
    const fobs = [...(unitFobs.get(unit) ?? [])].sort(compareCodePoints);
    lines.push(`${unit},${fobs.join(FOB_ID_SEPARATOR)}`);
  }
  return lines.join('\n');
}

/**
 * Builds the unit-to-fob report for a set of records.
 *
 * @param records - Loaded access records
 * @returns Report text; header only when no record names a unit
 */
export function generateFobReport(records: Iterable<AccessRecord>): string {
  return renderFobReport(buildUnitFobSets(records));
}
