import { describe, expect, it } from 'vitest';

import { record } from './helpers/assemble.js';

const reg = (name: string) => ({ kind: 'Register', name });
const label = (name: string) => ({ kind: 'Label', name, relative: false });
const num = (value: number) => ({ kind: 'Number', value });

describe('load/store address form', () => {
  it('uses a bare dereference as a zero offset', () => {
    expect(record('lw t0, (t1)').instructions()).toEqual([
      { op: 'I', line: 1, first: 35, fields: [reg('T1'), reg('T0'), num(0)] },
    ]);
  });

  it('keeps a small offset in the instruction', () => {
    expect(record('sw t0, -4(sp)').instructions()).toEqual([
      {
        op: 'I',
        line: 1,
        first: 43,
        fields: [reg('SP'), reg('T0'), { kind: 'Tagged', tag: 'lower', constant: num(-4) }],
      },
    ]);
  });

  it('builds an indexed label address in AT', () => {
    expect(record('lw t0, table(t1)').instructions()).toEqual([
      {
        op: 'I',
        line: 1,
        first: 15,
        fields: [0, reg('AT'), { kind: 'Tagged', tag: 'upper', constant: label('table') }],
      },
      { op: 'R', line: 1, first: 0, fields: [reg('AT'), reg('T1'), reg('AT'), 0, 33] },
      {
        op: 'I',
        line: 1,
        first: 35,
        fields: [reg('AT'), reg('T0'), { kind: 'Tagged', tag: 'lower', constant: label('table') }],
      },
    ]);
  });

  it('skips the index add for a plain label', () => {
    const calls = record('sw t0, table').instructions();
    expect(calls.map((c) => c.first)).toEqual([15, 43]);
    expect(calls[1]?.fields[0]).toEqual(reg('AT'));
  });

  it('splits a number that does not fit a signed offset', () => {
    const calls = record('lw t0, 0x12345678(t1)').instructions();
    expect(calls.map((c) => c.op)).toEqual(['I', 'R', 'I']);
    expect(calls[2]?.fields[2]).toEqual({
      kind: 'Tagged',
      tag: 'lower',
      constant: num(0x12345678),
    });
  });

  it('transfers floating-point registers', () => {
    expect(record('lwc1 f2, 8(sp)').instructions()[0]).toEqual({
      op: 'I',
      line: 1,
      first: 49,
      fields: [reg('SP'), reg('F2'), { kind: 'Tagged', tag: 'lower', constant: num(8) }],
    });
  });

  it('requires a base for a short offset', () => {
    expect(() => record('lw t0, 0x1234')).toThrow(
      'main.asm:1: Error: expected register to dereference',
    );
  });

  it('rejects a general register where a float register is expected', () => {
    expect(() => record('lwc1 t0, 0(sp)')).toThrow('main.asm:1: Error: wrong type of register');
  });
});
