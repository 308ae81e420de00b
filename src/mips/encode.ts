import type { SourceLocation } from '../diagnostics/types.js';
import { AssemblerError, DiagnosticIds, InternalError } from '../diagnostics/types.js';
import type { ConstantOperand, EncodingField } from '../lowering/requests.js';
import { registerNumber } from './registers.js';

/**
 * What field encoding needs to know about the instruction being encoded.
 */
export interface FieldContext {
  /** Address of the instruction. */
  pc: number;
  where: SourceLocation;
  /** Address of a label; reports an undefined label itself. */
  labelAddress(name: string): number;
}

function fail(ctx: FieldContext, message: string): never {
  throw new AssemblerError(ctx.where, message, DiagnosticIds.EmitError);
}

function hex(n: number): string {
  return `0x${(n >>> 0).toString(16).toUpperCase()}`;
}

function constantValue(constant: ConstantOperand, ctx: FieldContext): number {
  return constant.kind === 'Number' ? constant.value : ctx.labelAddress(constant.name);
}

function signed16(value: number, ctx: FieldContext): number {
  if (value < -0x8000 || value > 0x7fff) {
    fail(ctx, `constant ${value} does not fit in a signed 16-bit field`);
  }
  return value & 0xffff;
}

function branchOffset(target: number, ctx: FieldContext): number {
  const delta = (target >>> 0) - ((ctx.pc + 4) >>> 0);
  if (delta % 4 !== 0) fail(ctx, `branch target ${hex(target)} is not word aligned`);
  const words = delta / 4;
  if (words < -0x8000 || words > 0x7fff) fail(ctx, `branch target ${hex(target)} is out of range`);
  return words & 0xffff;
}

function jumpIndex(target: number, ctx: FieldContext): number {
  const t = target >>> 0;
  if (t % 4 !== 0) fail(ctx, `jump target ${hex(t)} is not word aligned`);
  if (Math.floor(t / 0x10000000) !== Math.floor(((ctx.pc + 4) >>> 0) / 0x10000000)) {
    fail(ctx, `jump target ${hex(t)} is outside the current 256 MiB region`);
  }
  return (t >>> 2) & 0x3ffffff;
}

function tagValue(field: Exclude<EncodingField, number>, ctx: FieldContext): number {
  switch (field.kind) {
    case 'Register': {
      const n = registerNumber(field.name);
      if (n === undefined) throw new InternalError(`unknown register ${field.name}`);
      return n;
    }
    case 'Number':
      return field.value;
    case 'Label':
      return ctx.labelAddress(field.name);
    case 'Tagged': {
      const c = field.constant;
      switch (field.tag) {
        case 'signed':
          if (c.kind === 'Label' && c.relative) return branchOffset(ctx.labelAddress(c.name), ctx);
          return signed16(constantValue(c, ctx) | 0, ctx);
        case 'negated':
          return signed16(-constantValue(c, ctx), ctx);
        case 'index':
          return jumpIndex(constantValue(c, ctx), ctx);
        case 'upper': {
          const v = constantValue(c, ctx) >>> 0;
          return ((v >>> 16) + ((v & 0x8000) !== 0 ? 1 : 0)) & 0xffff;
        }
        case 'lower':
          return constantValue(c, ctx) & 0xffff;
      }
    }
  }
}

/**
 * Resolve one encoding field to the unsigned integer stored in a `width`-bit slot.
 *
 * Tagged operands compute their final 16/26-bit form; everything else must already fit.
 */
export function fieldValue(field: EncodingField, width: number, ctx: FieldContext): number {
  const limit = 2 ** width;
  if (typeof field === 'number') {
    if (!Number.isInteger(field) || field < 0 || field >= limit) {
      throw new InternalError(`fixed value ${field} does not fit a ${width}-bit field`);
    }
    return field;
  }
  const value = tagValue(field, ctx);
  if (field.kind === 'Tagged' || field.kind === 'Register') {
    if (value >= limit) {
      throw new InternalError(`${field.kind} operand placed in a ${width}-bit field`);
    }
    return value;
  }
  if (value < 0 || value >= limit) {
    fail(ctx, `constant ${value} does not fit in ${width} bits`);
  }
  return value;
}

export function encodeJ(opcode: number, target: number): number {
  return ((opcode << 26) | target) >>> 0;
}

export function encodeI(opcode: number, rs: number, rt: number, imm: number): number {
  return ((opcode << 26) | (rs << 21) | (rt << 16) | imm) >>> 0;
}

export function encodeR(
  opcode: number,
  rs: number,
  rt: number,
  rd: number,
  sa: number,
  funct: number,
): number {
  return ((opcode << 26) | (rs << 21) | (rt << 16) | (rd << 11) | (sa << 6) | funct) >>> 0;
}
