import type { SourceLocation } from '../diagnostics/types.js';
import { AssemblerError, DiagnosticIds, InternalError } from '../diagnostics/types.js';
import type { EmittedSourceSegment, SymbolEntry } from '../formats/types.js';
import { encodeI, encodeJ, encodeR, fieldValue, type FieldContext } from '../mips/encode.js';
import type { EncodingShape } from '../mips/instructions.js';
import type {
  ConstantOperand,
  DirectiveRequest,
  EmitResult,
  Emitter,
  EncodingField,
} from './requests.js';

export type Endianness = 'big' | 'little';

export interface BinaryEmitterOptions {
  /** Byte order of halfwords and words (default `big`). */
  endian?: Endianness;
  /** Initial address before any `ORG` (default 0). */
  origin?: number;
}

type Pending =
  | {
      kind: 'instruction';
      address: number;
      where: SourceLocation;
      shape: EncodingShape;
      first: number;
      fields: EncodingField[];
    }
  | {
      kind: 'data';
      address: number;
      where: SourceLocation;
      width: 1 | 2 | 4;
      value: ConstantOperand;
    }
  | { kind: 'fill'; address: number; where: SourceLocation; size: number; fill: number };

const FIELD_WIDTHS: Readonly<Record<EncodingShape, readonly number[]>> = {
  jump: [26],
  immediate: [5, 5, 16],
  register: [5, 5, 5, 5, 6],
};

const ADDRESS_LIMIT = 0x1_0000_0000;

function isAnchorLabel(name: string): boolean {
  return /^[0-9]/.test(name);
}

/**
 * Binary emitter: tracks the current address, places labels, and records each request.
 *
 * Instruction and data sizes never depend on label addresses, so every label has its final
 * address as soon as it is added; `dump()` then encodes all recorded requests in one sweep.
 */
export class BinaryEmitter implements Emitter {
  private readonly endian: Endianness;
  private pc: number;
  private readonly labels = new Map<string, { address: number; where: SourceLocation }>();
  private readonly constants: SymbolEntry[] = [];
  private readonly pending: Pending[] = [];
  private dumped = false;

  constructor(options: BinaryEmitterOptions = {}) {
    this.endian = options.endian ?? 'big';
    this.pc = (options.origin ?? 0) >>> 0;
  }

  /** Current emission address. */
  get address(): number {
    return this.pc;
  }

  addLabel(name: string, file: string, line: number): void {
    const where = { file, line };
    const prev = this.labels.get(name);
    if (prev) {
      throw new AssemblerError(
        where,
        `duplicate label "${name}" (first defined at ${prev.where.file}:${prev.where.line})`,
        DiagnosticIds.EmitError,
      );
    }
    this.labels.set(name, { address: this.pc, where });
  }

  addConstant(name: string, value: number, file: string, line: number): void {
    this.constants.push({ kind: 'constant', name, value, file, line });
  }

  addDirective(file: string, line: number, request: DirectiveRequest): void {
    const where = { file, line };
    switch (request.name) {
      case 'ORG':
        if (!Number.isInteger(request.address) || request.address < -0x8000_0000) {
          this.fail(where, `invalid origin ${request.address}`);
        }
        if (request.address >= ADDRESS_LIMIT) this.fail(where, `invalid origin ${request.address}`);
        this.pc = request.address >>> 0;
        return;
      case 'ALIGN': {
        const size = request.size === 0 ? 4 : request.size;
        if (size < 0 || (size & (size - 1)) !== 0) {
          this.fail(where, `alignment ${request.size} is not a power of two`);
        }
        const pad = (size - (this.pc % size)) % size;
        this.pushFill(where, pad, this.fillByte(where, request.fill ?? 0));
        return;
      }
      case 'SKIP':
        if (request.size < 0) this.fail(where, `cannot skip a negative size (${request.size})`);
        if (request.fill !== undefined) {
          this.pushFill(where, request.size, this.fillByte(where, request.fill));
        } else {
          this.advance(where, request.size);
        }
        return;
      case 'BYTE':
        this.checkRange(where, request.value, -0x80, 0xff, 'byte');
        this.pushData(where, 1, { kind: 'Number', value: request.value });
        return;
      case 'HALFWORD':
        this.checkRange(where, request.value, -0x8000, 0xffff, 'halfword');
        this.pushData(where, 2, { kind: 'Number', value: request.value });
        return;
      case 'WORD':
        if (request.value.kind === 'Number') {
          this.checkRange(where, request.value.value, -0x8000_0000, 0xffff_ffff, 'word');
        }
        this.pushData(where, 4, request.value);
        return;
    }
  }

  addInstructionJ(file: string, line: number, first: number, out1: EncodingField): void {
    this.pushInstruction({ file, line }, 'jump', first, [out1]);
  }

  addInstructionI(
    file: string,
    line: number,
    first: number,
    out1: EncodingField,
    out2: EncodingField,
    out3: EncodingField,
  ): void {
    this.pushInstruction({ file, line }, 'immediate', first, [out1, out2, out3]);
  }

  addInstructionR(
    file: string,
    line: number,
    first: number,
    out1: EncodingField,
    out2: EncodingField,
    out3: EncodingField,
    out4: EncodingField,
    out5: EncodingField,
  ): void {
    this.pushInstruction({ file, line }, 'register', first, [out1, out2, out3, out4, out5]);
  }

  dump(): EmitResult {
    if (this.dumped) throw new InternalError('emitter dumped twice');
    this.dumped = true;

    const bytes = new Map<number, number>();
    const sourceSegments: EmittedSourceSegment[] = [];

    for (const p of this.pending) {
      let out: number[];
      switch (p.kind) {
        case 'instruction':
          out = this.splitWord(this.encodeInstruction(p), 4);
          break;
        case 'data':
          out = this.splitWord(this.dataValue(p), p.width);
          break;
        case 'fill':
          out = new Array<number>(p.size).fill(p.fill);
          break;
      }
      out.forEach((b, i) => bytes.set((p.address + i) >>> 0, b));
      sourceSegments.push({
        start: p.address,
        end: p.address + out.length,
        file: p.where.file,
        line: p.where.line,
        kind: p.kind === 'instruction' ? 'code' : 'data',
      });
    }

    const symbols: SymbolEntry[] = [...this.constants];
    for (const [name, label] of this.labels) {
      if (isAnchorLabel(name)) continue;
      symbols.push({
        kind: 'label',
        name,
        address: label.address,
        file: label.where.file,
        line: label.where.line,
      });
    }

    return { map: { bytes, sourceSegments }, symbols };
  }

  private fail(where: SourceLocation, message: string): never {
    throw new AssemblerError(where, message, DiagnosticIds.EmitError);
  }

  private checkRange(where: SourceLocation, value: number, min: number, max: number, what: string) {
    if (!Number.isInteger(value) || value < min || value > max) {
      this.fail(where, `value ${value} does not fit in a ${what}`);
    }
  }

  private fillByte(where: SourceLocation, fill: number): number {
    this.checkRange(where, fill, -0x80, 0xff, 'fill byte');
    return fill & 0xff;
  }

  private advance(where: SourceLocation, size: number): void {
    if (this.pc + size > ADDRESS_LIMIT) this.fail(where, 'output exceeds the 32-bit address space');
    this.pc += size;
  }

  private pushFill(where: SourceLocation, size: number, fill: number): void {
    if (size === 0) return;
    this.pending.push({ kind: 'fill', address: this.pc, where, size, fill });
    this.advance(where, size);
  }

  private pushData(where: SourceLocation, width: 1 | 2 | 4, value: ConstantOperand): void {
    this.pending.push({ kind: 'data', address: this.pc, where, width, value });
    this.advance(where, width);
  }

  private pushInstruction(
    where: SourceLocation,
    shape: EncodingShape,
    first: number,
    fields: EncodingField[],
  ): void {
    this.pending.push({ kind: 'instruction', address: this.pc, where, shape, first, fields });
    this.advance(where, 4);
  }

  private labelAddress(where: SourceLocation, name: string): number {
    const label = this.labels.get(name);
    if (!label) this.fail(where, `undefined label "${name}"`);
    return label.address;
  }

  private dataValue(p: Extract<Pending, { kind: 'data' }>): number {
    return p.value.kind === 'Number' ? p.value.value : this.labelAddress(p.where, p.value.name);
  }

  private encodeInstruction(p: Extract<Pending, { kind: 'instruction' }>): number {
    const ctx: FieldContext = {
      pc: p.address,
      where: p.where,
      labelAddress: (name) => this.labelAddress(p.where, name),
    };
    const widths = FIELD_WIDTHS[p.shape];
    if (p.fields.length !== widths.length) {
      throw new InternalError(`${p.shape} encoding expects ${widths.length} fields`);
    }
    const v = p.fields.map((f, i) => fieldValue(f, widths[i] ?? 0, ctx));
    const at = (i: number): number => v[i] ?? 0;
    switch (p.shape) {
      case 'jump':
        return encodeJ(p.first, at(0));
      case 'immediate':
        return encodeI(p.first, at(0), at(1), at(2));
      case 'register':
        return encodeR(p.first, at(0), at(1), at(2), at(3), at(4));
    }
  }

  private splitWord(value: number, width: 1 | 2 | 4): number[] {
    const out: number[] = [];
    for (let i = width - 1; i >= 0; i--) {
      out.push(Math.floor((value >>> 0) / 2 ** (8 * i)) & 0xff);
    }
    return this.endian === 'big' ? out : out.reverse();
  }
}
