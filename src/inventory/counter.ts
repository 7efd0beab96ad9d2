import type { CounterRow, FrequencyCounter, LookupTable, UserTable } from './types.js';

/**
 * Empty table without a prototype, so keys such as "constructor" are plain data
 */
export function createTable<V>(): LookupTable<V> {
  return Object.create(null);
}

export function incrementCount(counter: FrequencyCounter, name: string, by = 1): void {
  counter[name] = (counter[name] ?? 0) + by;
}

export function countOccurrences(items: Iterable<string>): FrequencyCounter {
  const counter = createTable<number>();
  for (const item of items) {
    incrementCount(counter, item);
  }
  return counter;
}

export function mergeCounters(...counters: FrequencyCounter[]): FrequencyCounter {
  const merged = createTable<number>();
  for (const counter of counters) {
    for (const [name, count] of Object.entries(counter)) {
      incrementCount(merged, name, count);
    }
  }
  return merged;
}

export function counterTotal(counter: FrequencyCounter): number {
  return Object.values(counter).reduce((sum, count) => sum + count, 0);
}

/**
 * Descending by count; equal counts in name order
 */
export function sortCounter(counter: FrequencyCounter): CounterRow[] {
  return Object.entries(counter)
    .map(([name, count]) => ({ name, count }))
    .sort((a, b) => b.count - a.count || (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}

/**
 * Re-derive a fleet counter from a per-user table
 */
export function counterFromUserTable<T>(table: UserTable<T>, keyOf: (item: T) => string): FrequencyCounter {
  const counter = createTable<number>();
  for (const entries of Object.values(table)) {
    for (const entry of entries) {
      for (const item of entry.items) {
        incrementCount(counter, keyOf(item));
      }
    }
  }
  return counter;
}

/**
 * Keep the first item of each key, preserving order
 */
export function dedupeBy<T>(items: Iterable<T>, keyOf: (item: T) => string): T[] {
  const seen = new Set<string>();
  const unique: T[] = [];
  for (const item of items) {
    const key = keyOf(item);
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(item);
  }
  return unique;
}
