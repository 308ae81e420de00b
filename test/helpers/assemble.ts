import { Lexer } from '../../src/frontend/lexer.js';
import { parseTokens } from '../../src/frontend/parser.js';
import { collectTokens, resolveTokens } from '../../src/frontend/resolver.js';
import type { ResolvedToken, Token } from '../../src/frontend/token.js';
import { memorySourceReader } from '../../src/frontend/source.js';
import { assembleProgram } from '../../src/assemble.js';
import type { AssemblerOptions } from '../../src/pipeline.js';
import { RecordingEmitter } from './recording_emitter.js';

export const MAIN = 'main.asm';

export function lexAll(text: string, files: Record<string, string> = {}, file = MAIN): Token[] {
  const lexer = new Lexer(text, file, { reader: memorySourceReader(files) });
  const out: Token[] = [];
  for (let t = lexer.next(); t !== undefined; t = lexer.next()) out.push(t);
  return out;
}

export function resolveText(text: string): ResolvedToken[] {
  return resolveTokens(collectTokens(new Lexer(text, MAIN, { reader: memorySourceReader({}) })));
}

/** Parse `text` against a recording emitter. */
export function record(text: string): RecordingEmitter {
  const emitter = new RecordingEmitter();
  parseTokens(resolveText(text), MAIN, emitter);
  return emitter;
}

/** Assemble `text` and read back the emitted bytes as big-endian words from `origin`. */
export function words(text: string, origin = 0, options: AssemblerOptions = {}): number[] {
  const { map } = assembleProgram(text, MAIN, options, { reader: memorySourceReader({}) });
  const out: number[] = [];
  for (let addr = origin; map.bytes.has(addr); addr += 4) {
    let w = 0;
    for (let i = 0; i < 4; i++) w = w * 256 + (map.bytes.get(addr + i) ?? 0);
    out.push(w);
  }
  return out;
}
