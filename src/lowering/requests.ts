/**
 * Contracts between the parser and the binary emitter.
 *
 * The parser only produces these values; the emitter owns addresses, label bookkeeping and
 * all arithmetic on them.
 */
import type { EmittedByteMap, SymbolEntry } from '../formats/types.js';
import type { ConstantTag } from '../mips/instructions.js';

export interface RegisterOperand {
  kind: 'Register';
  /** Upper-cased register name, e.g. `T0`, `F2`, `STATUS`, `AT`. */
  name: string;
}

/**
 * A constant as written in source: a number or a label.
 *
 * `relative` labels are branch targets and encode as an offset from the delay slot.
 */
export type ConstantOperand =
  | { kind: 'Number'; value: number }
  | { kind: 'Label'; name: string; relative: boolean };

export interface TaggedOperand {
  kind: 'Tagged';
  tag: ConstantTag;
  constant: ConstantOperand;
}

export type ValueOperand = ConstantOperand | TaggedOperand;

/**
 * One positional field of an instruction encoding request.
 *
 * Plain numbers are fixed fields (literal zero, table constants).
 */
export type EncodingField = number | RegisterOperand | ValueOperand;

/**
 * Normalized directive requests.
 */
export type DirectiveRequest =
  | { name: 'ORG'; address: number }
  | { name: 'ALIGN'; size: number; fill?: number }
  | { name: 'SKIP'; size: number; fill?: number }
  | { name: 'BYTE'; value: number }
  | { name: 'HALFWORD'; value: number }
  | { name: 'WORD'; value: ConstantOperand };

/**
 * Output of a completed emission.
 */
export interface EmitResult {
  map: EmittedByteMap;
  symbols: SymbolEntry[];
}

/**
 * Binary emitter contract consumed by the parser and by instruction overrides.
 *
 * Every request carries the file/line it came from; the emitter reports its own failures there.
 */
export interface Emitter {
  addLabel(name: string, file: string, line: number): void;
  addDirective(file: string, line: number, request: DirectiveRequest): void;
  addInstructionJ(file: string, line: number, first: number, out1: EncodingField): void;
  addInstructionI(
    file: string,
    line: number,
    first: number,
    out1: EncodingField,
    out2: EncodingField,
    out3: EncodingField,
  ): void;
  addInstructionR(
    file: string,
    line: number,
    first: number,
    out1: EncodingField,
    out2: EncodingField,
    out3: EncodingField,
    out4: EncodingField,
    out5: EncodingField,
  ): void;
  /** Record a define so it shows up in symbol tables; it never affects encoding. */
  addConstant?(name: string, value: number, file: string, line: number): void;
  /** Finalize; called exactly once after a successful parse. */
  dump(): EmitResult;
}

export const register = (name: string): RegisterOperand => ({ kind: 'Register', name });

export const numberOperand = (value: number): ConstantOperand => ({ kind: 'Number', value });

export const tagged = (tag: ConstantTag, constant: ConstantOperand): TaggedOperand => ({
  kind: 'Tagged',
  tag,
  constant,
});
