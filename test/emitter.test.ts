import { describe, expect, it } from 'vitest';

import { BinaryEmitter } from '../src/lowering/emitter.js';
import { assembleProgram } from '../src/assemble.js';
import { memorySourceReader } from '../src/frontend/source.js';
import type { AssemblerOptions } from '../src/pipeline.js';
import { MAIN, words } from './helpers/assemble.js';

function bytesOf(text: string, options: AssemblerOptions = {}): Array<[number, number]> {
  const { map } = assembleProgram(text, MAIN, options, { reader: memorySourceReader({}) });
  return [...map.bytes.entries()].sort((a, b) => a[0] - b[0]);
}

describe('BinaryEmitter encoding', () => {
  it('encodes a jump within the current region', () => {
    expect(words('.org 0x80000000\nj start\nstart: nop', 0x80000000)).toEqual([0x08000001, 0]);
  });

  it('encodes a backward branch relative to the delay slot', () => {
    const loop = 'loop: addiu t0, t0, -1\nbne t0, zero, loop\nnop\n';
    expect(words(loop)).toEqual([0x2508ffff, 0x1500fffe, 0]);
  });

  it('encodes anchors the same way as named labels', () => {
    expect(words('-: addiu t0, t0, -1\nbne t0, zero, -\nnop\n')).toEqual([
      0x2508ffff, 0x1500fffe, 0,
    ]);
    expect(words('beq t0, t1, +\nnop\n+:\n')).toEqual([0x11090001, 0]);
  });

  it('encodes shift amounts', () => {
    expect(words('sll t0, t1, 4')).toEqual([0x00094100]);
  });

  it('encodes table pseudo-instructions', () => {
    expect(words('move t0, t1\nneg t0, t1\nsubiu sp, sp, 16\nb +\nnop\n+:')).toEqual([
      0x01204021, 0x00094022, 0x27bdfff0, 0x10000001, 0,
    ]);
  });

  it('writes little-endian words on request', () => {
    expect(bytesOf('.word 0x11223344', { endian: 'little' })).toEqual([
      [0, 0x44],
      [1, 0x33],
      [2, 0x22],
      [3, 0x11],
    ]);
  });

  it('pads alignment with zero bytes', () => {
    expect(bytesOf('.byte 1\n.align 4\n.byte 2')).toEqual([
      [0, 1],
      [1, 0],
      [2, 0],
      [3, 0],
      [4, 2],
    ]);
  });

  it('leaves a gap for SKIP unless a fill is given', () => {
    expect(bytesOf('.skip 2\n.byte 7')).toEqual([[2, 7]]);
    expect(bytesOf('.skip 2, 0xff\n.byte 7')).toEqual([
      [0, 0xff],
      [1, 0xff],
      [2, 7],
    ]);
  });

  it('stores halfwords and negative bytes', () => {
    expect(bytesOf('.halfword 0xbeef\n.byte -1')).toEqual([
      [0, 0xbe],
      [1, 0xef],
      [2, 0xff],
    ]);
  });

  it('resolves label words against their final address', () => {
    expect(words('.org 0x1000\n.align 4\n.word label\nlabel: nop', 0x1000)).toEqual([0x1004, 0]);
  });

  it('lists labels and defines but not anchors', () => {
    const { symbols } = assembleProgram('[size]: 8\n-: nop\nfoo: nop\n', MAIN);
    expect(symbols).toEqual([
      { kind: 'constant', name: 'size', value: 8, file: MAIN, line: 1 },
      { kind: 'label', name: 'foo', address: 4, file: MAIN, line: 3 },
    ]);
  });
});

describe('BinaryEmitter errors', () => {
  it.each([
    ['.byte 300', 1, 'value 300 does not fit in a byte'],
    ['.halfword 0x10000', 1, 'value 65536 does not fit in a halfword'],
    ['.align 3', 1, 'alignment 3 is not a power of two'],
    ['.skip 2, 256', 1, 'value 256 does not fit in a fill byte'],
    ['a: nop\na: nop', 2, 'duplicate label "a" (first defined at main.asm:1)'],
    ['j nowhere', 1, 'undefined label "nowhere"'],
    ['addiu t0, t0, 40000', 1, 'constant 40000 does not fit in a signed 16-bit field'],
    ['ori t0, t0, 0x10000', 1, 'constant 65536 does not fit in 16 bits'],
    ['sll t0, t1, 32', 1, 'constant 32 does not fit in 5 bits'],
    [
      '.org 0x0ffffff8\nj next\nnop\nnext:',
      2,
      'jump target 0x10000000 is outside the current 256 MiB region',
    ],
    ['.org 0xfffffffc\nnop\nnop', 3, 'output exceeds the 32-bit address space'],
  ])('rejects %s', (source, line, reason) => {
    expect(() => assembleProgram(source, MAIN)).toThrow(`main.asm:${line}: Error: ${reason}`);
  });

  it('refuses a second dump', () => {
    const emitter = new BinaryEmitter();
    emitter.dump();
    expect(() => emitter.dump()).toThrow('Internal Error: emitter dumped twice');
  });

  it('starts at the configured origin', () => {
    const emitter = new BinaryEmitter({ origin: 0x400 });
    emitter.addDirective(MAIN, 1, { name: 'BYTE', value: 9 });
    expect(emitter.address).toBe(0x401);
    expect([...emitter.dump().map.bytes]).toEqual([[0x400, 9]]);
  });
});
