/**
 * Delimiter scanning.
 *
 * Finds structural delimiter occurrences: literal matches of the delimiter
 * that are not immediately preceded by the escape marker. A match at
 * index 0 is always structural.
 */
import { ESCAPE_MARKER } from './escape.js';

export interface FindDelimiterOptions {
  /** Return the last structural occurrence instead of the first. */
  last?: boolean;
  /** Earliest index an occurrence may start at. */
  from?: number;
  /** Occurrences must end at or before this index. */
  before?: number;
}

function isStructural(buffer: string, index: number): boolean {
  return index === 0 || buffer[index - 1] !== ESCAPE_MARKER;
}

/**
 * Locate a structural occurrence of `delimiter` in `buffer`.
 *
 * @returns The start index of the occurrence, or -1 if there is none
 */
export function findDelimiter(
  buffer: string,
  delimiter: string,
  options: FindDelimiterOptions = {},
): number {
  const from = Math.max(0, options.from ?? 0);
  const end = Math.min(buffer.length, options.before ?? buffer.length);
  const lastStart = end - delimiter.length;
  if (delimiter.length === 0 || lastStart < from) return -1;

  if (options.last) {
    let index = buffer.lastIndexOf(delimiter, lastStart);
    while (index >= from) {
      if (isStructural(buffer, index)) return index;
      index = index === 0 ? -1 : buffer.lastIndexOf(delimiter, index - 1);
    }
    return -1;
  }

  let index = buffer.indexOf(delimiter, from);
  while (index !== -1 && index <= lastStart) {
    if (isStructural(buffer, index)) return index;
    index = buffer.indexOf(delimiter, index + 1);
  }
  return -1;
}
