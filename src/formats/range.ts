import type { AddressRange, EmittedByteMap } from './types.js';

/**
 * Compute contiguous written segments from an emitted byte map.
 *
 * - Segments are half-open `[start, end)` and sorted by address.
 * - For an empty map, `[]` is returned.
 */
export function getWrittenSegments(map: EmittedByteMap): AddressRange[] {
  const sorted = Array.from(map.bytes.keys()).sort((a, b) => a - b);
  const segments: AddressRange[] = [];
  let current: AddressRange | undefined;

  for (const addr of sorted) {
    if (current && addr === current.end) {
      current.end = addr + 1;
      continue;
    }
    if (current) segments.push(current);
    current = { start: addr, end: addr + 1 };
  }

  if (current) segments.push(current);
  return segments;
}

/**
 * Compute the effective written range for an emitted byte map.
 *
 * - If `map.writtenRange` is present, it is returned directly.
 * - Otherwise, the range spans the lowest to the highest written address.
 * - For an empty map, `{ start: 0, end: 0 }` is returned.
 */
export function getWrittenRange(map: EmittedByteMap): AddressRange {
  if (map.writtenRange) return map.writtenRange;
  const segments = getWrittenSegments(map);
  const first = segments[0];
  const last = segments[segments.length - 1];
  if (!first || !last) return { start: 0, end: 0 };
  return { start: first.start, end: last.end };
}
