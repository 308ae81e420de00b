import { getWrittenRange } from './range.js';
import type { BinArtifact, EmittedByteMap, SymbolEntry, WriteBinOptions } from './types.js';

/**
 * Create a flat binary artifact from an emitted address->byte map.
 *
 * Bytes are emitted for the written range; unwritten addresses inside it (gaps left by `SKIP` or a
 * forward `ORG`) take the pad byte.
 */
export function writeBin(
  map: EmittedByteMap,
  _symbols: SymbolEntry[],
  opts?: WriteBinOptions,
): BinArtifact {
  const padByte = (opts?.padByte ?? 0) & 0xff;
  const { start, end } = getWrittenRange(map);
  const out = new Uint8Array(Math.max(0, end - start)).fill(padByte);
  for (const [addr, byte] of map.bytes) {
    if (addr >= start && addr < end) out[addr - start] = byte;
  }
  return { kind: 'bin', bytes: out };
}
