import { describe, expect, it } from 'vitest';
import { resolve } from 'node:path';

import { Lexer } from '../src/frontend/lexer.js';
import { memorySourceReader } from '../src/frontend/source.js';
import type { Token } from '../src/frontend/token.js';
import { lexAll } from './helpers/assemble.js';

function kinds(tokens: Token[]): string[] {
  return tokens.map((t) => t.kind);
}

function drain(lexer: Lexer): Token[] {
  const out: Token[] = [];
  for (let t = lexer.next(); t !== undefined; t = lexer.next()) out.push(t);
  return out;
}

describe('Lexer', () => {
  it('tokenizes an instruction line and skips comments', () => {
    const tokens = lexAll('start: addiu T0, t0, -1 ; count down\n');
    expect(kinds(tokens)).toEqual([
      'Label',
      'Instruction',
      'Register',
      'Separator',
      'Register',
      'Separator',
      'Number',
      'EndOfLine',
      'EndOfFile',
    ]);
    expect(tokens[0]).toEqual({ file: 'main.asm', line: 1, kind: 'Label', value: 'start' });
    expect(tokens[1]).toMatchObject({ kind: 'Instruction', value: 'ADDIU' });
    expect(tokens[4]).toMatchObject({ kind: 'Register', value: 'T0' });
    expect(tokens[6]).toMatchObject({ kind: 'Number', value: -1 });
    expect(tokens[8]).toEqual({ file: 'main.asm', line: 2, kind: 'EndOfFile' });
  });

  it('treats // as a comment too', () => {
    expect(kinds(lexAll('nop // idle'))).toEqual(['Instruction', 'EndOfFile']);
  });

  it('parses number bases', () => {
    const values = lexAll('.word 0x1F, 0b101, 0o17, 42')
      .filter((t) => t.kind === 'Number')
      .map((t) => (t.kind === 'Number' ? t.value : undefined));
    expect(values).toEqual([31, 5, 15, 42]);
  });

  it('reads dereferences, defines and anchors', () => {
    const tokens = lexAll('[size]: 4\n-: lw t0, @size(SP)\n+:\nb ++\n');
    expect(tokens[0]).toMatchObject({ kind: 'Define', value: 'size' });
    expect(tokens[3]).toMatchObject({ kind: 'RelLabel', value: '-', line: 2 });
    expect(tokens[7]).toMatchObject({ kind: 'DefineRef', value: 'size' });
    expect(tokens[8]).toMatchObject({ kind: 'Deref', value: 'SP' });
    expect(tokens[10]).toMatchObject({ kind: 'RelLabel', value: '+' });
    expect(tokens[13]).toMatchObject({ kind: 'RelLabelRef', value: 2 });
  });

  it('upper-cases directives and aliases INCLUDE', () => {
    const tokens = lexAll('.Include "defs.inc"\n', { 'defs.inc': '' });
    expect(tokens[0]).toMatchObject({ kind: 'Directive', value: 'INC' });
  });

  it('decodes string escapes', () => {
    const tokens = lexAll(String.raw`.ascii "A\nA\"\\\x41"`);
    expect(tokens[1]).toMatchObject({ kind: 'String', value: [65, 10, 65, 34, 92, 65] });
  });

  it('lexes included files in place, naming them by resolved path', () => {
    const tokens = lexAll('.inc "defs.inc"\nnop\n', { 'defs.inc': 'x: nop\n' });
    const inc = resolve('defs.inc');
    expect(tokens.map((t) => [t.kind, t.file, t.line])).toEqual([
      ['Directive', 'main.asm', 1],
      ['Label', inc, 1],
      ['Instruction', inc, 1],
      ['EndOfLine', inc, 1],
      ['EndOfFile', inc, 2],
      ['EndOfLine', 'main.asm', 1],
      ['Instruction', 'main.asm', 2],
      ['EndOfLine', 'main.asm', 2],
      ['EndOfFile', 'main.asm', 3],
    ]);
  });

  it('searches include directories after the including file directory', () => {
    const lexer = new Lexer('.inc "m.inc"\n', '/proj/main.asm', {
      includeDirs: ['/lib'],
      reader: memorySourceReader({ '/lib/m.inc': 'nop\n' }),
    });
    const tokens = drain(lexer);
    expect(tokens[1]).toEqual({
      file: resolve('/lib/m.inc'),
      line: 1,
      kind: 'Instruction',
      value: 'NOP',
    });
  });

  it('reports a missing include', () => {
    expect(() => lexAll('.inc "missing.inc"\n')).toThrow(
      'main.asm:1: Error: include file not found: "missing.inc"',
    );
  });

  it('reports a recursive include', () => {
    const files = { '/proj/a.asm': '.inc "b.asm"\n', '/proj/b.asm': '.inc "a.asm"\n' };
    const lexer = new Lexer('.inc "b.asm"\n', '/proj/a.asm', { reader: memorySourceReader(files) });
    expect(() => drain(lexer)).toThrow(
      `${resolve('/proj/b.asm')}:1: Error: recursive include of "a.asm"`,
    );
  });

  it.each([
    ['.ascii "abc', 'unterminated string'],
    ['.word 0x', 'invalid number "0x"'],
    ['.word 0x100000000', 'number 0x100000000 is out of range'],
    ['# nop', "unexpected character '#'"],
    ['lw t0, (f2)', 'cannot dereference "f2"'],
    [String.raw`.ascii "\q"`, String.raw`unknown escape \q`],
    [String.raw`.ascii "\x4"`, String.raw`invalid \x escape`],
  ])('rejects %s', (source, reason) => {
    expect(() => lexAll(source)).toThrow(`main.asm:1: Error: ${reason}`);
  });
});
