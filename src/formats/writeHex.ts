import { getWrittenSegments } from './range.js';
import type { EmittedByteMap, HexArtifact, SymbolEntry, WriteHexOptions } from './types.js';

function toHexByte(n: number): string {
  return (n & 0xff).toString(16).toUpperCase().padStart(2, '0');
}

function checksum(bytes: number[]): number {
  const sum = bytes.reduce((acc, b) => acc + (b & 0xff), 0) & 0xff;
  return ((0x100 - sum) & 0xff) >>> 0;
}

function record(address16: number, type: number, data: number[]): string {
  const hi = (address16 >> 8) & 0xff;
  const lo = address16 & 0xff;
  const fields = [data.length, hi, lo, type, ...data];
  return `:${fields.map(toHexByte).join('')}${toHexByte(checksum(fields))}`;
}

/**
 * Create an Intel HEX artifact from an emitted address->byte map.
 *
 * - Emits type-00 data records for written bytes only; gaps produce no records.
 * - Emits a type-04 extended linear address record whenever the upper 16 address bits change
 *   (none while they stay zero). Data records never cross a 64 KiB boundary.
 * - Ends with a type-01 EOF record.
 */
export function writeHex(
  map: EmittedByteMap,
  _symbols: SymbolEntry[],
  opts?: WriteHexOptions,
): HexArtifact {
  const lineEnding = opts?.lineEnding ?? '\n';
  const recordSize = opts?.recordSize ?? 16;
  const lines: string[] = [];
  let upper = 0;

  for (const segment of getWrittenSegments(map)) {
    let addr = segment.start;
    while (addr < segment.end) {
      const addrUpper = Math.floor(addr / 0x10000);
      if (addrUpper !== upper) {
        lines.push(record(0, 0x04, [(addrUpper >> 8) & 0xff, addrUpper & 0xff]));
        upper = addrUpper;
      }
      const boundary = (addrUpper + 1) * 0x10000;
      const count = Math.min(recordSize, segment.end - addr, boundary - addr);
      const data: number[] = [];
      for (let i = 0; i < count; i++) {
        data.push(map.bytes.get(addr + i) ?? 0);
      }
      lines.push(record(addr % 0x10000, 0x00, data));
      addr += count;
    }
  }

  lines.push(':00000001FF');
  return { kind: 'hex', text: lines.join(lineEnding) + lineEnding };
}
