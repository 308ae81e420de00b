import { describe, expect, it } from 'vitest';

import { record } from './helpers/assemble.js';

const reg = (name: string) => ({ kind: 'Register', name });
const label = (name: string, relative: boolean) => ({ kind: 'Label', name, relative });

describe('format engine', () => {
  it('lays out register instructions in output order', () => {
    expect(record('addu t0, t1, t2').instructions()).toEqual([
      { op: 'R', line: 1, first: 0, fields: [reg('T1'), reg('T2'), reg('T0'), 0, 33] },
    ]);
  });

  it('treats separators as optional', () => {
    expect(record('addu t0 t1 t2').instructions()[0]?.fields).toEqual([
      reg('T1'),
      reg('T2'),
      reg('T0'),
      0,
      33,
    ]);
  });

  it('tags jump targets with their word index', () => {
    expect(record('j target').instructions()).toEqual([
      {
        op: 'J',
        line: 1,
        first: 2,
        fields: [{ kind: 'Tagged', tag: 'index', constant: label('target', false) }],
      },
    ]);
  });

  it('marks branch targets as relative', () => {
    expect(record('beq t0, t1, target').instructions()[0]).toEqual({
      op: 'I',
      line: 1,
      first: 4,
      fields: [
        reg('T0'),
        reg('T1'),
        { kind: 'Tagged', tag: 'signed', constant: label('target', true) },
      ],
    });
  });

  it('places system registers and the format constant', () => {
    expect(record('mfc0 t0, status').instructions()[0]).toEqual({
      op: 'R',
      line: 1,
      first: 16,
      fields: [0, reg('T0'), reg('STATUS'), 0, 0],
    });
  });

  it('emits a zero-operand instruction', () => {
    expect(record('nop').instructions()[0]?.fields).toEqual([0, 0, 0, 0, 0]);
  });

  it('records labels at their line', () => {
    expect(record('\nhere: nop').calls[0]).toEqual({ op: 'label', name: 'here', line: 2 });
  });

  it.each([
    ['ori t0, t1, table', 'labels are not allowed here'],
    ['addu t0, f1, t2', 'wrong type of register'],
    ['addu t0, at, t2', 'wrong type of register'],
    ['addu t0, t1', 'expected register'],
    ['ori t0, t1, t2', 'expected constant'],
    ['frob t0', 'unexpected token (unknown instruction?)'],
    ['ulw t0, 0(t1)', 'unimplemented instruction'],
    ['nop t0', 'expected end of line'],
  ])('rejects %s', (source, reason) => {
    expect(() => record(source)).toThrow(`main.asm:1: Error: ${reason}`);
  });
});
