import { numberOperand, register, tagged } from '../lowering/requests.js';
import type { InstructionParser } from './engine.js';
import { SCRATCH_REGISTER } from './registers.js';

/**
 * Handler for a mnemonic whose syntax the format engine cannot express.
 *
 * `parse` starts with the cursor just past the mnemonic and must stop at the end of the line;
 * the dispatch loop checks for it.
 */
export interface InstructionOverride {
  parse(parser: InstructionParser, mnemonic: string): void;
}

const ZERO = register('R0');
const SP = register('SP');
const RA = register('RA');
const AT = register(SCRATCH_REGISTER);

/** `LI rt, imm`: the shortest of ADDIU, ORI or LUI(+ORI) that loads `imm`. */
class LoadImmediate implements InstructionOverride {
  parse(parser: InstructionParser): void {
    const { cursor } = parser;
    const rt = register(cursor.register());
    cursor.optionalComma();
    const imm = cursor.number();
    const value = imm >>> 0;
    const low = value & 0xffff;

    if ((imm | 0) >= -0x8000 && (imm | 0) <= 0x7fff) {
      parser.emit('ADDIU', { rt, rs: ZERO, immediate: tagged('signed', numberOperand(imm)) });
    } else if (value <= 0xffff) {
      parser.emit('ORI', { rt, rs: ZERO, immediate: numberOperand(value) });
    } else {
      parser.emit('LUI', { rt, immediate: numberOperand(value >>> 16) });
      if (low !== 0) parser.emit('ORI', { rt, rs: rt, immediate: numberOperand(low) });
    }
  }
}

/** `LA rt, address`: LUI upper + ADDIU lower, always two instructions. */
class LoadAddress implements InstructionOverride {
  parse(parser: InstructionParser): void {
    const { cursor } = parser;
    const rt = register(cursor.register());
    cursor.optionalComma();
    const address = cursor.constant('allowed');
    parser.emit('LUI', { rt, immediate: tagged('upper', address) });
    parser.emit('ADDIU', { rt, rs: rt, immediate: tagged('lower', address) });
  }
}

/** `JR` alone returns through RA. */
class JumpRegister implements InstructionOverride {
  parse(parser: InstructionParser): void {
    const { cursor } = parser;
    const rs = cursor.isEOL() ? RA : register(cursor.register());
    parser.emit('JR', { rs });
  }
}

/** `JALR rs` links through RA; `JALR rd, rs` names the link register. */
class JumpAndLinkRegister implements InstructionOverride {
  parse(parser: InstructionParser): void {
    const { cursor } = parser;
    const first = register(cursor.register());
    if (cursor.isEOL()) {
      parser.emit('JALR', { rd: RA, rs: first });
      return;
    }
    cursor.optionalComma();
    parser.emit('JALR', { rd: first, rs: register(cursor.register()) });
  }
}

function registerList(parser: InstructionParser): string[] {
  const { cursor } = parser;
  const names = [cursor.register()];
  while (!cursor.isEOL()) {
    cursor.optionalComma();
    names.push(cursor.register());
  }
  return names;
}

/** `PUSH r...`: reserve a word per register on the stack, then store them in order. */
class Push implements InstructionOverride {
  parse(parser: InstructionParser): void {
    const names = registerList(parser);
    const size = names.length * 4;
    parser.emit('ADDIU', { rt: SP, rs: SP, immediate: tagged('signed', numberOperand(-size)) });
    names.forEach((name, i) => {
      parser.emit('SW', {
        rt: register(name),
        offset: tagged('signed', numberOperand(i * 4)),
        base: SP,
      });
    });
  }
}

/** `POP r...`: the inverse of `PUSH` with the same register list. */
class Pop implements InstructionOverride {
  parse(parser: InstructionParser): void {
    const names = registerList(parser);
    const size = names.length * 4;
    names.forEach((name, i) => {
      parser.emit('LW', {
        rt: register(name),
        offset: tagged('signed', numberOperand(i * 4)),
        base: SP,
      });
    });
    parser.emit('ADDIU', { rt: SP, rs: SP, immediate: tagged('signed', numberOperand(size)) });
  }
}

/** `BEQI`/`BNEI rs, imm, target`: load `imm` into AT, then BEQ/BNE against it. */
class BranchImmediate implements InstructionOverride {
  constructor(private readonly branch: 'BEQ' | 'BNE') {}

  parse(parser: InstructionParser): void {
    const { cursor } = parser;
    const rs = register(cursor.register());
    cursor.optionalComma();
    const imm = cursor.constant('forbidden');
    cursor.optionalComma();
    const target = cursor.constant('relative');
    parser.emit('ADDIU', { rt: AT, rs: ZERO, immediate: tagged('signed', imm) });
    parser.emit(this.branch, { rs, rt: AT, offset: tagged('signed', target) });
  }
}

/**
 * Overrides by mnemonic, consulted before the format engine.
 */
export const instructionOverrides: ReadonlyMap<string, InstructionOverride> = new Map<
  string,
  InstructionOverride
>([
  ['LI', new LoadImmediate()],
  ['LA', new LoadAddress()],
  ['JR', new JumpRegister()],
  ['JALR', new JumpAndLinkRegister()],
  ['PUSH', new Push()],
  ['POP', new Pop()],
  ['BEQI', new BranchImmediate('BEQ')],
  ['BNEI', new BranchImmediate('BNE')],
]);
