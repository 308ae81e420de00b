import { describe, expect, it } from 'vitest';

import {
  anchorLabel,
  collectTokens,
  findAnchor,
  resolveTokens,
} from '../src/frontend/resolver.js';
import { tokenStreamOf, type Token } from '../src/frontend/token.js';

const MAIN = 'main.asm';
const at = { file: MAIN, line: 1 };

const rel = (value: '+' | '-'): Token => ({ ...at, kind: 'RelLabel', value });
const ref = (value: number): Token => ({ ...at, kind: 'RelLabelRef', value });
const eof = (file = MAIN): Token => ({ file, line: 1, kind: 'EndOfFile' });

function collect(tokens: Token[]) {
  return collectTokens(tokenStreamOf(MAIN, tokens));
}

describe('relative anchors', () => {
  const tokens = [
    rel('-'),
    rel('+'),
    ref(-1),
    ref(1),
    rel('-'),
    rel('+'),
    ref(-2),
    rel('+'),
    eof(),
  ];

  it('records forward anchors ascending and backward anchors newest first', () => {
    const c = collect(tokens);
    expect(c.forwardAnchors).toEqual([1, 5, 7]);
    expect(c.backwardAnchors).toEqual([4, 0]);
  });

  it('resolves references to the nearest matching anchor', () => {
    const resolved = resolveTokens(collect(tokens));
    expect(resolved[2]).toEqual({ ...at, kind: 'LabelRef', value: '0' });
    expect(resolved[3]).toEqual({ ...at, kind: 'LabelRef', value: '5' });
    expect(resolved[6]).toEqual({ ...at, kind: 'LabelRef', value: '0' });
  });

  it('turns anchors into labels named by their buffer position', () => {
    const resolved = resolveTokens(collect(tokens));
    expect(resolved[0]).toEqual({ ...at, kind: 'Label', value: anchorLabel(0) });
    expect(resolved[7]).toEqual({ ...at, kind: 'Label', value: '7' });
  });

  it('counts anchors for longer runs', () => {
    const c = collect(tokens);
    expect(findAnchor(c, 3, 2)).toBe(7);
    expect(findAnchor(c, 6, -1)).toBe(4);
    expect(findAnchor(c, 3, 3)).toBeUndefined();
  });

  it('rejects a reference past the last anchor', () => {
    const c = collect([rel('+'), ref(1), eof()]);
    expect(() => resolveTokens(c)).toThrow(
      'main.asm:1: Error: could not find appropriate relative label',
    );
  });

  it('leaves the collected buffer untouched', () => {
    const c = collect(tokens);
    resolveTokens(c);
    expect(c.tokens[2]).toEqual(ref(-1));
    expect(c.tokens[0]).toEqual(rel('-'));
  });
});

describe('defines', () => {
  const define = (name: string): Token => ({ ...at, kind: 'Define', value: name });
  const use = (name: string): Token => ({ ...at, kind: 'DefineRef', value: name });
  const num = (value: number): Token => ({ ...at, kind: 'Number', value });
  const eol: Token = { ...at, kind: 'EndOfLine' };

  it('replaces references with the bound number', () => {
    const resolved = resolveTokens(collect([define('size'), num(16), eol, use('size'), eof()]));
    expect(resolved[3]).toEqual({ ...at, kind: 'Number', value: 16 });
  });

  it('resolves a reference that precedes its definition', () => {
    const resolved = resolveTokens(collect([use('n'), define('n'), num(3), eof()]));
    expect(resolved[0]).toEqual({ ...at, kind: 'Number', value: 3 });
  });

  it('reports an undefined define', () => {
    const c = collect([use('nope'), eof()]);
    expect(() => resolveTokens(c)).toThrow('main.asm:1: Error: undefined define');
  });

  it('requires a number after a define', () => {
    const reg: Token = { ...at, kind: 'Register', value: 'T0' };
    expect(() => collect([define('x'), reg, eof()])).toThrow(
      'main.asm:1: Error: expected number for define',
    );
  });

  it('rejects rebinding a define to a different value', () => {
    expect(() => collect([define('x'), num(1), define('x'), num(2), eof()])).toThrow(
      'main.asm:1: Error: define "x" is already bound to 1',
    );
  });
});

describe('collection', () => {
  it('fails when the stream ends before the top-level end of file', () => {
    expect(() => collect([{ ...at, kind: 'EndOfLine' }])).toThrow('Internal Error: missing token');
  });

  it('keeps going past an included file ending', () => {
    const c = collect([eof('/inc/defs.inc'), eof()]);
    expect(c.tokens).toHaveLength(2);
  });
});
