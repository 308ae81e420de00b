/**
 * Generic instruction format engine.
 *
 * `formatIn` walks a descriptor's input roles and fills an operand bundle from the cursor;
 * `formatOut` lays the bundle out in output-field order and hands it to the emitter as a
 * jump, immediate or register encoding request. Neither interprets operand values.
 */
import type { SourceLocation } from '../diagnostics/types.js';
import { InternalError } from '../diagnostics/types.js';
import type { TokenCursor } from '../frontend/cursor.js';
import type {
  EncodingField,
  Emitter,
  RegisterOperand,
  ValueOperand,
} from '../lowering/requests.js';
import { numberOperand, register, tagged } from '../lowering/requests.js';
import type {
  EncodingLayout,
  InputRole,
  InstructionDescriptor,
  InstructionTable,
  Slot,
} from './instructions.js';
import { SCRATCH_REGISTER } from './registers.js';

/** Parsed operands of one instruction, keyed by slot. */
export type OperandBundle = Partial<Record<Slot, RegisterOperand | ValueOperand>>;

/**
 * What an override gets: the live cursor plus a way to emit table instructions.
 */
export interface InstructionParser {
  readonly cursor: TokenCursor;
  readonly emitter: Emitter;
  readonly instructions: InstructionTable;
  /** Position of the instruction being assembled. */
  readonly where: SourceLocation;
  /** Emit `mnemonic` from a prepared bundle, laid out per its table entry. */
  emit(mnemonic: string, args: OperandBundle): void;
}

function readRole(cursor: TokenCursor, role: InputRole): RegisterOperand | ValueOperand {
  switch (role.kind) {
    case 'register':
      return register(cursor.register(role.registers));
    case 'constant': {
      const c = cursor.constant(role.labels);
      return role.tag ? tagged(role.tag, c) : c;
    }
    case 'deref':
      return register(cursor.deref());
  }
}

/**
 * Parse operands for `input`. A separator is optional between two operands unless the second is
 * a dereference, which follows its offset directly.
 */
export function formatIn(cursor: TokenCursor, input: readonly InputRole[]): OperandBundle {
  const args: OperandBundle = {};
  input.forEach((role, i) => {
    args[role.slot] = readRole(cursor, role);
    const next = input[i + 1];
    if (next !== undefined && next.kind !== 'deref') cursor.optionalComma();
  });
  return args;
}

function outputFields(layout: EncodingLayout, args: OperandBundle): EncodingField[] {
  return layout.output.map((field) => {
    switch (field) {
      case 'zero':
        return 0;
      case 'const':
        if (layout.constant === undefined) {
          throw new InternalError(`missing constant for instruction ${layout.mnemonic}`);
        }
        return layout.constant;
      case 'formatConst':
        if (layout.formatConstant === undefined) {
          throw new InternalError(`missing format constant for instruction ${layout.mnemonic}`);
        }
        return layout.formatConstant;
      default: {
        const value = args[field];
        if (value === undefined) {
          throw new InternalError(`instruction ${layout.mnemonic} has no ${field} operand`);
        }
        return value;
      }
    }
  });
}

/**
 * Emit one encoding request; the output length picks the shape.
 */
export function formatOut(
  emitter: Emitter,
  where: SourceLocation,
  layout: EncodingLayout,
  args: OperandBundle,
): void {
  const out = outputFields(layout, args);
  const field = (i: number): EncodingField => {
    const f = out[i];
    if (f === undefined) throw new InternalError('invalid output formatting string');
    return f;
  };
  const { file, line } = where;
  switch (out.length) {
    case 1:
      emitter.addInstructionJ(file, line, layout.opcode, field(0));
      return;
    case 3:
      emitter.addInstructionI(file, line, layout.opcode, field(0), field(1), field(2));
      return;
    case 5:
      emitter.addInstructionR(
        file,
        line,
        layout.opcode,
        field(0),
        field(1),
        field(2),
        field(3),
        field(4),
      );
      return;
    default:
      throw new InternalError('invalid output formatting string');
  }
}

/**
 * Table entry that `formatOut` can lay out, i.e. anything but a bare pseudo entry.
 */
export function encodableDescriptor(
  instructions: InstructionTable,
  mnemonic: string,
): Exclude<InstructionDescriptor, { kind: 'pseudo' }> {
  const d = instructions.get(mnemonic);
  if (d === undefined || d.kind === 'pseudo') {
    throw new InternalError(`instruction ${mnemonic} has no encoding`);
  }
  return d;
}

function fitsSigned16(value: number): boolean {
  const v = value | 0;
  return v >= -0x8000 && v <= 0x7fff;
}

/**
 * Load/store at an address: `op reg, (base)`, `op reg, offset(base)`, `op reg, label` or
 * `op reg, label(index)`.
 *
 * A label, or a number that does not fit a signed 16-bit offset, is split into
 * `LUI AT, upper`, an optional `ADDU AT, AT, index`, and the real instruction with base `AT`
 * and offset `lower`.
 */
export function parseAddressForm(
  parser: InstructionParser,
  descriptor: Extract<InstructionDescriptor, { kind: 'address' }>,
): void {
  const { cursor } = parser;
  const args: OperandBundle = {};
  args[descriptor.transfer.slot] = register(cursor.register(descriptor.transfer.registers));
  cursor.optionalComma();

  if (cursor.token.kind === 'Deref') {
    args.offset = numberOperand(0);
    args.base = register(cursor.deref());
  } else {
    const address = cursor.constant('allowed');
    args.offset = tagged('lower', address);
    if (address.kind === 'Label' || !fitsSigned16(address.value)) {
      const scratch = register(SCRATCH_REGISTER);
      parser.emit('LUI', { rt: scratch, immediate: tagged('upper', address) });
      if (!cursor.isEOL()) {
        parser.emit('ADDU', { rd: scratch, rs: scratch, rt: register(cursor.deref()) });
      }
      args.base = scratch;
    } else {
      args.base = register(cursor.deref());
    }
  }
  formatOut(parser.emitter, parser.where, descriptor, args);
}
