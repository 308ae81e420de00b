import type {
  EmittedByteMap,
  EmittedSourceSegment,
  ListingArtifact,
  SymbolEntry,
  WriteListingOptions,
} from './types.js';
import { getWrittenRange, getWrittenSegments } from './range.js';

function toHexByte(n: number): string {
  return (n & 0xff).toString(16).toUpperCase().padStart(2, '0');
}

function toHexAddress(n: number): string {
  return (n >>> 0).toString(16).toUpperCase().padStart(8, '0');
}

function formatSymbol(s: SymbolEntry): string {
  if (s.kind === 'constant') {
    return `${s.kind} ${s.name} = $${toHexAddress(s.value)} (${s.value})`;
  }
  return `${s.kind} ${s.name} = $${toHexAddress(s.address)}`;
}

function sortSymbols(a: SymbolEntry, b: SymbolEntry): number {
  const key = (s: SymbolEntry): string =>
    s.kind === 'constant'
      ? `1\n${toHexAddress(s.value)}\n${s.name.toLowerCase()}`
      : `0\n${toHexAddress(s.address)}\n${s.name.toLowerCase()}`;
  return key(a).localeCompare(key(b));
}

function bytesOf(map: EmittedByteMap, start: number, end: number): string[] {
  const out: string[] = [];
  for (let addr = start; addr < end; addr++) {
    const byte = map.bytes.get(addr);
    out.push(byte === undefined ? '..' : toHexByte(byte));
  }
  return out;
}

function sourceLines(
  map: EmittedByteMap,
  segments: EmittedSourceSegment[],
  bytesPerLine: number,
): string[] {
  const lines: string[] = [];
  for (const seg of segments) {
    for (let addr = seg.start; addr < seg.end; addr += bytesPerLine) {
      const chunk = bytesOf(map, addr, Math.min(seg.end, addr + bytesPerLine)).join(' ');
      const where = addr === seg.start ? `  ; ${seg.file}:${seg.line}` : '';
      lines.push(`${toHexAddress(addr)}: ${chunk.padEnd(bytesPerLine * 3 - 1, ' ')}${where}`);
    }
  }
  return lines;
}

function dumpLines(map: EmittedByteMap, bytesPerLine: number): string[] {
  const lines: string[] = [];
  for (const seg of getWrittenSegments(map)) {
    for (let addr = seg.start; addr < seg.end; addr += bytesPerLine) {
      const chunk = bytesOf(map, addr, Math.min(seg.end, addr + bytesPerLine));
      lines.push(`${toHexAddress(addr)}: ${chunk.join(' ')}`);
    }
  }
  return lines;
}

/**
 * Create a deterministic `.lst` listing artifact.
 *
 * With source segments, each request gets its own line(s) tagged with `file:line`; without
 * them the listing falls back to a plain dump of the written segments. A symbol table follows.
 */
export function writeListing(
  map: EmittedByteMap,
  symbols: SymbolEntry[],
  opts?: WriteListingOptions,
): ListingArtifact {
  const lineEnding = opts?.lineEnding ?? '\n';
  const bytesPerLine = opts?.bytesPerLine ?? 4;
  const { start, end } = getWrittenRange(map);

  const lines: string[] = [];
  lines.push('; mipsasm listing');
  lines.push(`; range: $${toHexAddress(start)}..$${toHexAddress(end)} (end exclusive)`);
  lines.push('');

  if (map.sourceSegments && map.sourceSegments.length > 0) {
    lines.push(...sourceLines(map, map.sourceSegments, bytesPerLine));
  } else {
    lines.push(...dumpLines(map, bytesPerLine));
  }

  lines.push('');
  lines.push('; symbols:');
  for (const s of [...symbols].sort(sortSymbols)) {
    lines.push(`; ${formatSymbol(s)}`);
  }

  return { kind: 'lst', text: lines.join(lineEnding) + lineEnding };
}
