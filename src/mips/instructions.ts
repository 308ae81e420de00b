import { InternalError } from '../diagnostics/types.js';
import type { RegisterClass } from './registers.js';
import rawInstructionTable from './instructions.json' with { type: 'json' };

/**
 * Operand-bundle slots an input role can fill and an output field can read.
 */
export type RegisterSlot = 'rd' | 'rs' | 'rt' | 'fd' | 'fs' | 'ft';
export type ConstantSlot = 'offset' | 'immediate' | 'index';
export type Slot = RegisterSlot | ConstantSlot | 'base';

/**
 * How a constant operand is tagged before it reaches the emitter.
 *
 * - `signed`: sign-extended 16-bit field; relative labels become branch offsets.
 * - `negated`: negated, then treated as `signed`.
 * - `index`: word index of a jump target (`addr >> 2`, 26 bits).
 * - `upper`: upper 16 bits of an address, carry-adjusted for a sign-extended `lower`.
 * - `lower`: low 16 bits of an address.
 */
export type ConstantTag = 'signed' | 'negated' | 'index' | 'upper' | 'lower';

/**
 * Whether a constant operand may be written as a label.
 *
 * `relative` allows labels and marks them PC-relative (branch targets).
 */
export type LabelPolicy = 'allowed' | 'relative' | 'forbidden';

export type InputRole =
  | { kind: 'register'; code: InputCode; slot: RegisterSlot; registers: RegisterClass }
  | {
      kind: 'constant';
      code: InputCode;
      slot: ConstantSlot;
      labels: LabelPolicy;
      tag?: ConstantTag;
    }
  | { kind: 'deref'; code: InputCode; slot: 'base' };

export type InputCode =
  | 'd'
  | 's'
  | 't'
  | 'D'
  | 'S'
  | 'T'
  | 'X'
  | 'Y'
  | 'Z'
  | 'o'
  | 'r'
  | 'i'
  | 'I'
  | 'k'
  | 'K'
  | 'b';

/**
 * Input format characters and the operand role each one parses.
 */
export const INPUT_ROLES: Readonly<Record<InputCode, InputRole>> = {
  d: { kind: 'register', code: 'd', slot: 'rd', registers: 'general' },
  s: { kind: 'register', code: 's', slot: 'rs', registers: 'general' },
  t: { kind: 'register', code: 't', slot: 'rt', registers: 'general' },
  D: { kind: 'register', code: 'D', slot: 'fd', registers: 'float' },
  S: { kind: 'register', code: 'S', slot: 'fs', registers: 'float' },
  T: { kind: 'register', code: 'T', slot: 'ft', registers: 'float' },
  X: { kind: 'register', code: 'X', slot: 'rd', registers: 'system' },
  Y: { kind: 'register', code: 'Y', slot: 'rs', registers: 'system' },
  Z: { kind: 'register', code: 'Z', slot: 'rt', registers: 'system' },
  o: { kind: 'constant', code: 'o', slot: 'offset', labels: 'allowed', tag: 'signed' },
  r: { kind: 'constant', code: 'r', slot: 'offset', labels: 'relative', tag: 'signed' },
  i: { kind: 'constant', code: 'i', slot: 'immediate', labels: 'forbidden' },
  I: { kind: 'constant', code: 'I', slot: 'index', labels: 'allowed', tag: 'index' },
  k: { kind: 'constant', code: 'k', slot: 'immediate', labels: 'forbidden', tag: 'negated' },
  K: { kind: 'constant', code: 'K', slot: 'immediate', labels: 'forbidden', tag: 'signed' },
  b: { kind: 'deref', code: 'b', slot: 'base' },
};

/**
 * Output format characters: a bundle slot, a literal zero, or one of the entry's constants.
 */
export type OutputField = Slot | 'zero' | 'const' | 'formatConst';

const OUTPUT_FIELDS: Readonly<Record<string, OutputField>> = {
  d: 'rd',
  s: 'rs',
  t: 'rt',
  D: 'fd',
  S: 'fs',
  T: 'ft',
  o: 'offset',
  i: 'immediate',
  I: 'index',
  b: 'base',
  '0': 'zero',
  C: 'const',
  F: 'formatConst',
};

/**
 * Encoding shape, selected by output-format length (1/3/5).
 */
export type EncodingShape = 'jump' | 'immediate' | 'register';

const SHAPE_BY_LENGTH: ReadonlyMap<number, EncodingShape> = new Map([
  [1, 'jump'],
  [3, 'immediate'],
  [5, 'register'],
]);

/**
 * How a descriptor's operands are laid out in the target encoding.
 */
export interface EncodingLayout {
  mnemonic: string;
  /** Primary 6-bit opcode. */
  opcode: number;
  shape: EncodingShape;
  output: readonly OutputField[];
  constant?: number;
  formatConstant?: number;
}

/**
 * A validated instruction-table entry.
 *
 * - `format`: parsed by the generic engine from its input roles.
 * - `address`: the load/store-at-address pseudo-form (`tob` / `Tob`).
 * - `pseudo`: recognized mnemonic without formats; only an override can assemble it.
 */
export type InstructionDescriptor =
  | (EncodingLayout & { kind: 'format'; input: readonly InputRole[] })
  | (EncodingLayout & { kind: 'address'; transfer: InputRole & { kind: 'register' } })
  | { kind: 'pseudo'; mnemonic: string };

export type InstructionTable = ReadonlyMap<string, InstructionDescriptor>;

const ADDRESS_FORMS = new Set(['tob', 'Tob']);

function isInputCode(c: string): c is InputCode {
  return Object.prototype.hasOwnProperty.call(INPUT_ROLES, c);
}

function readInteger(
  mnemonic: string,
  entry: ReadonlyMap<string, unknown>,
  key: string,
  max: number,
): number | undefined {
  const v = entry.get(key);
  if (v === undefined) return undefined;
  if (typeof v !== 'number' || !Number.isInteger(v) || v < 0 || v > max) {
    throw new InternalError(`invalid ${key} for instruction ${mnemonic}`);
  }
  return v;
}

function readFormat(
  mnemonic: string,
  entry: ReadonlyMap<string, unknown>,
  key: string,
): string | undefined {
  const v = entry.get(key);
  if (v === undefined) return undefined;
  if (typeof v !== 'string') {
    throw new InternalError(`invalid ${key} format for instruction ${mnemonic}`);
  }
  return v;
}

function parseInputFormat(mnemonic: string, format: string): InputRole[] {
  const roles: InputRole[] = [];
  const filled = new Set<Slot>();
  for (const c of format) {
    if (!isInputCode(c)) {
      throw new InternalError(`invalid input formatting string for instruction ${mnemonic}`);
    }
    const role = INPUT_ROLES[c];
    if (filled.has(role.slot)) {
      throw new InternalError(`input format for instruction ${mnemonic} fills ${role.slot} twice`);
    }
    filled.add(role.slot);
    roles.push(role);
  }
  return roles;
}

function parseOutputFormat(mnemonic: string, format: string): OutputField[] {
  const fields: OutputField[] = [];
  for (const c of format) {
    const field = OUTPUT_FIELDS[c];
    if (field === undefined) {
      throw new InternalError(`invalid output formatting string for instruction ${mnemonic}`);
    }
    fields.push(field);
  }
  return fields;
}

/**
 * Validate one raw table entry and turn it into a descriptor.
 *
 * Every defect a malformed entry could cause at parse time is reported here instead.
 */
export function compileDescriptor(mnemonic: string, raw: unknown): InstructionDescriptor {
  if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) {
    throw new InternalError(`invalid table entry for instruction ${mnemonic}`);
  }
  const entry = new Map<string, unknown>(Object.entries(raw));
  const input = readFormat(mnemonic, entry, 'input');
  const outputText = readFormat(mnemonic, entry, 'output');
  const opcode = readInteger(mnemonic, entry, 'opcode', 63);
  const constant = readInteger(mnemonic, entry, 'const', 0xffff);
  const formatConstant = readInteger(mnemonic, entry, 'formatConst', 31);

  if (input === undefined && outputText === undefined) {
    return { kind: 'pseudo', mnemonic };
  }
  if (input === undefined || outputText === undefined || opcode === undefined) {
    throw new InternalError(`incomplete table entry for instruction ${mnemonic}`);
  }

  const output = parseOutputFormat(mnemonic, outputText);
  const shape = SHAPE_BY_LENGTH.get(output.length);
  if (shape === undefined) {
    throw new InternalError(`invalid output formatting string for instruction ${mnemonic}`);
  }
  if (output.includes('const') && constant === undefined) {
    throw new InternalError(`instruction ${mnemonic} uses a constant it does not define`);
  }
  if (output.includes('formatConst') && formatConstant === undefined) {
    throw new InternalError(`instruction ${mnemonic} uses a format constant it does not define`);
  }

  const roles = parseInputFormat(mnemonic, input);
  const filled = new Set<OutputField>(roles.map((r) => r.slot));
  for (const field of output) {
    if (field === 'zero' || field === 'const' || field === 'formatConst') continue;
    if (!filled.has(field)) {
      throw new InternalError(`output format for instruction ${mnemonic} reads unfilled ${field}`);
    }
  }

  const layout: EncodingLayout = {
    mnemonic,
    opcode,
    shape,
    output,
    ...(constant !== undefined ? { constant } : {}),
    ...(formatConstant !== undefined ? { formatConstant } : {}),
  };

  if (ADDRESS_FORMS.has(input)) {
    const transfer = roles[0];
    if (transfer?.kind !== 'register') {
      throw new InternalError(`invalid address form for instruction ${mnemonic}`);
    }
    return { ...layout, kind: 'address', transfer };
  }
  return { ...layout, kind: 'format', input: roles };
}

/**
 * Build a validated instruction table from raw JSON-shaped data.
 *
 * Mnemonics are upper-cased; the lexer recognizes exactly the keys of the result.
 */
export function loadInstructionTable(raw: unknown): InstructionTable {
  if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) {
    throw new InternalError('instruction table must be an object');
  }
  const table = new Map<string, InstructionDescriptor>();
  for (const [name, entry] of Object.entries(raw)) {
    const mnemonic = name.toUpperCase();
    table.set(mnemonic, compileDescriptor(mnemonic, entry));
  }
  return table;
}

/**
 * The built-in R4300i table, validated once at module load.
 */
export const defaultInstructionTable: InstructionTable = loadInstructionTable(rawInstructionTable);
