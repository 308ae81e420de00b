import { dirname, isAbsolute, resolve } from 'node:path';

import type { SourceLocation } from '../diagnostics/types.js';
import { AssemblerError, DiagnosticIds } from '../diagnostics/types.js';
import { defaultInstructionTable, type InstructionTable } from '../mips/instructions.js';
import { registerClassOf, registerNumber } from '../mips/registers.js';
import { fileSourceReader, type SourceReader } from './source.js';
import type { Token, TokenStream } from './token.js';

export interface LexerOptions {
  /** Directories searched for `.inc` targets after the including file's own directory. */
  includeDirs?: string[];
  reader?: SourceReader;
  /** Mnemonics recognized as instructions (default: the built-in table). */
  instructions?: InstructionTable;
}

interface Frame {
  /** Name reported in tokens. */
  file: string;
  /** Absolute path, used for recursion checks and relative includes. */
  path: string;
  text: string;
  pos: number;
  line: number;
}

const DIRECTIVE_ALIASES: ReadonlyMap<string, string> = new Map([['INCLUDE', 'INC']]);

const ESCAPES: ReadonlyMap<string, number> = new Map([
  ['n', 10],
  ['t', 9],
  ['r', 13],
  ['0', 0],
  ['\\', 92],
  ['"', 34],
]);

const IDENT = /^[A-Za-z_][A-Za-z0-9_.]*/;

function parseNumberLiteral(text: string): number | undefined {
  const negative = text.startsWith('-');
  const t = negative ? text.slice(1) : text;
  let value: number | undefined;
  if (/^0x[0-9A-Fa-f]+$/i.test(t)) {
    value = Number.parseInt(t.slice(2), 16);
  } else if (/^0b[01]+$/i.test(t)) {
    value = Number.parseInt(t.slice(2), 2);
  } else if (/^0o[0-7]+$/i.test(t)) {
    value = Number.parseInt(t.slice(2), 8);
  } else if (/^[0-9]+$/.test(t)) {
    value = Number.parseInt(t, 10);
  }
  if (value === undefined) return undefined;
  return negative ? -value : value;
}

/**
 * Pull-based tokenizer over a source file and everything it includes.
 *
 * Each `next()` call lexes exactly one token from the innermost open file. `.inc "file"` yields an
 * `INC` directive token and then continues with the included file; when that file runs out the
 * lexer yields its `EndOfFile` and resumes the including line where it left off.
 */
export class Lexer implements TokenStream {
  readonly mainFile: string;
  private readonly stack: Frame[] = [];
  private readonly includeDirs: string[];
  private readonly reader: SourceReader;
  private readonly instructions: InstructionTable;

  constructor(text: string, mainFile: string, options: LexerOptions = {}) {
    this.mainFile = mainFile;
    this.includeDirs = options.includeDirs ?? [];
    this.reader = options.reader ?? fileSourceReader;
    this.instructions = options.instructions ?? defaultInstructionTable;
    this.stack.push({ file: mainFile, path: resolve(mainFile), text, pos: 0, line: 1 });
  }

  next(): Token | undefined {
    const frame = this.stack[this.stack.length - 1];
    if (!frame) return undefined;
    return this.scan(frame);
  }

  private fail(where: SourceLocation, message: string): never {
    throw new AssemblerError(where, message, DiagnosticIds.LexError);
  }

  private skipBlank(f: Frame): void {
    while (f.pos < f.text.length) {
      const ch = f.text[f.pos]!;
      if (ch === ' ' || ch === '\t' || ch === '\r') {
        f.pos++;
      } else if (ch === ';' || f.text.startsWith('//', f.pos)) {
        const eol = f.text.indexOf('\n', f.pos);
        f.pos = eol < 0 ? f.text.length : eol;
      } else {
        return;
      }
    }
  }

  private scan(f: Frame): Token {
    this.skipBlank(f);
    const where = { file: f.file, line: f.line };
    if (f.pos >= f.text.length) {
      this.stack.pop();
      return { ...where, kind: 'EndOfFile' };
    }

    const ch = f.text[f.pos]!;
    const eol = f.text.indexOf('\n', f.pos);
    const rest = f.text.slice(f.pos, eol < 0 ? undefined : eol);

    if (ch === '\n') {
      f.pos++;
      f.line++;
      return { ...where, kind: 'EndOfLine' };
    }
    if (ch === ',') {
      f.pos++;
      return { ...where, kind: 'Separator', value: ',' };
    }
    if (ch === '"') {
      return { ...where, kind: 'String', value: this.readString(f) };
    }
    if (ch === '(') {
      const m = /^\(\s*([A-Za-z0-9_]+)\s*\)/.exec(rest);
      if (!m) this.fail(where, 'expected register to dereference');
      const name = m[1]!.toUpperCase();
      if (registerClassOf(name) !== 'general') {
        this.fail(where, `cannot dereference "${m[1]}"`);
      }
      f.pos += m[0].length;
      return { ...where, kind: 'Deref', value: name };
    }
    if (ch === '.') {
      const m = /^\.([A-Za-z][A-Za-z0-9_]*)/.exec(rest);
      if (!m) this.fail(where, 'expected directive name');
      f.pos += m[0].length;
      const upper = m[1]!.toUpperCase();
      const name = DIRECTIVE_ALIASES.get(upper) ?? upper;
      if (name === 'INC') this.include(f, where);
      return { ...where, kind: 'Directive', value: name };
    }
    if (ch === '[') {
      const m = /^\[([A-Za-z_][A-Za-z0-9_.]*)\]:/.exec(rest);
      if (!m) this.fail(where, 'malformed define');
      f.pos += m[0].length;
      return { ...where, kind: 'Define', value: m[1]! };
    }
    if (ch === '@') {
      const m = /^@([A-Za-z_][A-Za-z0-9_.]*)/.exec(rest);
      if (!m) this.fail(where, 'expected define name after "@"');
      f.pos += m[0].length;
      return { ...where, kind: 'DefineRef', value: m[1]! };
    }

    const num = /^-?[0-9][A-Za-z0-9_]*/.exec(rest);
    if (num) {
      const value = parseNumberLiteral(num[0]);
      if (value === undefined) this.fail(where, `invalid number "${num[0]}"`);
      if (Math.abs(value) > 0xffff_ffff) this.fail(where, `number ${num[0]} is out of range`);
      f.pos += num[0].length;
      return { ...where, kind: 'Number', value };
    }

    if (ch === '+' || ch === '-') {
      if (rest[1] === ':') {
        f.pos += 2;
        return { ...where, kind: 'RelLabel', value: ch };
      }
      const run = ch === '+' ? /^\++/.exec(rest) : /^-+/.exec(rest);
      const count = run ? run[0].length : 1;
      f.pos += count;
      return { ...where, kind: 'RelLabelRef', value: ch === '+' ? count : -count };
    }

    const ident = IDENT.exec(rest);
    if (ident) {
      const text = ident[0];
      f.pos += text.length;
      if (f.text[f.pos] === ':') {
        f.pos++;
        return { ...where, kind: 'Label', value: text };
      }
      const upper = text.toUpperCase();
      if (registerNumber(upper) !== undefined) return { ...where, kind: 'Register', value: upper };
      if (this.instructions.has(upper)) return { ...where, kind: 'Instruction', value: upper };
      return { ...where, kind: 'LabelRef', value: text };
    }

    this.fail(where, `unexpected character '${ch}'`);
  }

  private readString(f: Frame): number[] {
    const where = { file: f.file, line: f.line };
    const out: number[] = [];
    f.pos++;
    for (;;) {
      const ch = f.text[f.pos];
      if (ch === undefined || ch === '\n') this.fail(where, 'unterminated string');
      f.pos++;
      if (ch === '"') return out;
      if (ch !== '\\') {
        const code = ch.charCodeAt(0);
        if (code > 0xff) this.fail(where, `character '${ch}' does not fit in a byte`);
        out.push(code);
        continue;
      }
      const esc = f.text[f.pos];
      if (esc === 'x') {
        const hex = /^[0-9A-Fa-f]{2}/.exec(f.text.slice(f.pos + 1));
        if (!hex) this.fail(where, 'invalid \\x escape');
        out.push(Number.parseInt(hex[0], 16));
        f.pos += 3;
        continue;
      }
      const code = esc === undefined ? undefined : ESCAPES.get(esc);
      if (code === undefined) this.fail(where, `unknown escape \\${esc ?? ''}`);
      out.push(code);
      f.pos++;
    }
  }

  private include(f: Frame, where: SourceLocation): void {
    this.skipBlank(f);
    if (f.text[f.pos] !== '"') this.fail(where, 'expected string');
    const name = String.fromCharCode(...this.readString(f));

    const candidates = isAbsolute(name)
      ? [name]
      : [resolve(dirname(f.path), name), ...this.includeDirs.map((dir) => resolve(dir, name))];
    for (const path of candidates) {
      const text = this.reader.read(path);
      if (text === undefined) continue;
      if (this.stack.some((open) => open.path === path)) {
        throw new AssemblerError(where, `recursive include of "${name}"`, DiagnosticIds.LexError);
      }
      this.stack.push({ file: path, path, text, pos: 0, line: 1 });
      return;
    }
    throw new AssemblerError(
      where,
      `include file not found: "${name}"`,
      DiagnosticIds.IncludeNotFound,
    );
  }
}
