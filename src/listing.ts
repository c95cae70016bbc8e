import type { Entry } from './entry.js';

const NAME_WIDTH = 50;
const SIZE_WIDTH = 8;

/**
 * One listing line: the bare name, or in long form the name, size and hex
 * offset in fixed columns.
 */
export function formatEntry(entry: Entry, long = false): string {
  if (!long) return entry.name;
  const size = String(entry.size).padStart(SIZE_WIDTH);
  return `${entry.name.padEnd(NAME_WIDTH)}${size}@ 0x${entry.offset.toString(16)}`;
}

export function formatListing(entries: readonly Entry[], long = false): string[] {
  return entries.map(e => formatEntry(e, long));
}
