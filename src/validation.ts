/**
 * @fileoverview Consistency checks on loaded access records. Every unit
 * identifier is expected to correspond to exactly one building `UnitID`;
 * a unit seen under several ids usually points at a mislabelled card.
 *
 * @module validation
 */

import { COLUMNS, compareCodePoints, readField, unitIdentifier, type AccessRecord } from './records';

/**
 * A unit identifier observed with more than one `UnitID`.
 */
export interface UnitIdConflict {
  /** Unit identifier (trimmed `CardFirstName`) */
  unit: string;
  /** Distinct non-empty `UnitID` values, in code-point order */
  unitIds: string[];
}

/**
 * Configuration options for validation operations.
 */
export interface ValidationOptions {
  /** Optional logger for outputting validation messages */
  logger?: Pick<typeof console, 'log' | 'warn'>;
}

/**
 * Collects the units whose records disagree on `UnitID`.
 *
 * @param records - Loaded access records
 * @returns Conflicts ordered by unit; empty when every unit is consistent
 *
 * @remarks
 * Records without a unit identifier or without a `UnitID` are ignored.
 */
export function findUnitIdConflicts(records: Iterable<AccessRecord>): UnitIdConflict[] {
  const unitIds = new Map<string, Set<string>>();
  for (const record of records) {
    const unit = unitIdentifier(record);
    const unitId = readField(record, COLUMNS.unitId);
    if (!unit || !unitId) {
      continue;
    }

    const seen = unitIds.get(unit) ?? new Set<string>();
    seen.add(unitId);
    unitIds.set(unit, seen);
  }

  return [...unitIds.entries()]
    .filter(([, ids]) => ids.size > 1)
    .map(([unit, ids]) => ({ unit, unitIds: [...ids].sort(compareCodePoints) }))
    .sort((a, b) => compareCodePoints(a.unit, b.unit));
}

/**
 * Checks that each unit maps to a single `UnitID` and logs the outcome.
 * Conflicts are reported as warnings; they never stop report generation.
 *
 * @param records - Loaded access records
 * @param options - Optional configuration including custom logger
 * @returns The conflicts found
 */
export function validateUnitConsistency(
  records: readonly AccessRecord[],
  options: ValidationOptions = {}
): UnitIdConflict[] {
  const logger = options.logger ?? console;
  const conflicts = findUnitIdConflicts(records);

  if (conflicts.length === 0) {
    const unitCount = new Set(records.map(unitIdentifier).filter((unit) => unit.length > 0)).size;
    logger.log(`Unit consistency check passed (${unitCount} units)`);
    return conflicts;
  }

  for (const conflict of conflicts) {
    logger.warn(`Unit ${conflict.unit} maps to multiple UnitIDs: ${conflict.unitIds.join(', ')}`);
  }
  return conflicts;
}
