/**
 * @fileoverview Occurrence counting utilities. Used to build per-unit hour
 * histograms and to pick the most frequent buckets out of them.
 *
 * @module utils/frequency
 */

/**
 * Map of values to the number of times they were observed.
 */
export type Frequency<K> = Map<K, number>;

/**
 * Increments the count of a key in a frequency map, starting from zero.
 * Mutates the map in place.
 *
 * @param frequency - Frequency map to update
 * @param key - Key whose count should be incremented
 * @returns The new count for the key
 */
export function incrementFrequency<K>(frequency: Frequency<K>, key: K): number {
  const next = (frequency.get(key) ?? 0) + 1;
  frequency.set(key, next);
  return next;
}

/**
 * Returns every key that shares the highest count, in insertion order.
 *
 * @param frequency - Frequency map to inspect
 * @returns Keys with the maximum count; empty when the map is empty
 *
 * @remarks
 * Ties are expected. Callers that need a stable order must sort the result,
 * since insertion order depends on the input order.
 */
export function keysWithMaxCount<K>(frequency: Frequency<K>): K[] {
  let max = 0;
  let keys: K[] = [];
  for (const [key, count] of frequency) {
    if (count > max) {
      max = count;
      keys = [key];
    } else if (count === max) {
      keys.push(key);
    }
  }
  return keys;
}
