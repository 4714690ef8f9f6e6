/**
 * Register-level command builders.
 *
 * Resolves caller-supplied register descriptors (address, bus width, named
 * bit fields) into plain Write / Check commands. The descriptors themselves
 * come from outside; nothing here knows about any particular chip.
 */
import { check, write } from './dcd';
import { CheckCond, Width, WriteOp } from './types';
import type { CheckCommand, U32, WriteCommand } from './types';

export interface FieldDef {
  offset: number;
  mask: U32;
}

export interface RegisterDef {
  address: U32;
  width: Width;
  fields: Record<string, FieldDef>;
}

/**
 * One operand of a value/mask expression:
 * - `{ field, value }`: `(value << offset) & mask`
 * - `{ field }`: every bit of the field
 * - a number: used as-is
 */
export type FieldArg = { field: string; value?: U32 } | U32;

export function widthFromBits(bits: 8 | 16 | 32): Width {
  switch (bits) {
    case 8: return Width.B1;
    case 16: return Width.B2;
    case 32: return Width.B4;
  }
}

function lookupField(reg: RegisterDef, name: string): FieldDef {
  const field = reg.fields[name];
  if (!field) {
    throw new Error(`Unknown field '${name}' in register at 0x${(reg.address >>> 0).toString(16)}`);
  }
  return field;
}

/** OR all operands together into one 32-bit value. */
export function buildValue(reg: RegisterDef, args: readonly FieldArg[]): U32 {
  let value = 0;
  for (const arg of args) {
    if (typeof arg === 'number') {
      value |= arg;
      continue;
    }
    const field = lookupField(reg, arg.field);
    value |= arg.value === undefined
      ? field.mask
      : (arg.value << field.offset) & field.mask;
  }
  return value >>> 0;
}

function makeWrite(op: WriteOp, reg: RegisterDef, args: readonly FieldArg[]): WriteCommand {
  return write(reg.address, buildValue(reg, args), reg.width, op);
}

function makeCheck(cond: CheckCond, reg: RegisterDef, args: readonly FieldArg[]): CheckCommand {
  return check(reg.address, buildValue(reg, args), cond, reg.width);
}

/** `register = args` */
export const writeReg = (reg: RegisterDef, ...args: FieldArg[]) => makeWrite(WriteOp.WRITE, reg, args);
/** `register |= args` */
export const setReg = (reg: RegisterDef, ...args: FieldArg[]) => makeWrite(WriteOp.SET, reg, args);
/** `register &= ~args` */
export const clearReg = (reg: RegisterDef, ...args: FieldArg[]) => makeWrite(WriteOp.CLEAR, reg, args);

// Checks below poll indefinitely; bound them with withCount.
export const checkAllClear = (reg: RegisterDef, ...args: FieldArg[]) => makeCheck(CheckCond.ALL_CLEAR, reg, args);
export const checkAnyClear = (reg: RegisterDef, ...args: FieldArg[]) => makeCheck(CheckCond.ANY_CLEAR, reg, args);
export const checkAllSet = (reg: RegisterDef, ...args: FieldArg[]) => makeCheck(CheckCond.ALL_SET, reg, args);
export const checkAnySet = (reg: RegisterDef, ...args: FieldArg[]) => makeCheck(CheckCond.ANY_SET, reg, args);

export function withCount(cmd: CheckCommand, count: U32): CheckCommand {
  return { ...cmd, count };
}
