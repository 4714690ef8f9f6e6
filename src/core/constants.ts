import { CheckCond, Width, WriteOp } from './types';

// Tag bytes (record header byte 0)
export const TAG = {
  BLOCK: 0xD2,
  WRITE: 0xCC,
  CHECK: 0xCF,
  NOP: 0xC0,
} as const;

// Fixed byte 3 of the block header
export const BLOCK_PARAM = 0x41;

export const HEADER_SIZE = 4;
export const WRITE_ENTRY_SIZE = 8;     // address + value
export const CHECK_SIZE = 12;          // header + address + mask
export const CHECK_COUNT_SIZE = 16;    // header + address + mask + count
export const NOP_SIZE = 4;

// Block and record lengths are stored in 16 bits
export const MAX_BLOCK_SIZE = 0xFFFF;

// Flag byte field masks
export const WIDTH_MASK = 0b00_111;
export const OP_MASK = 0b11_000;

// Names used by command files and listings
export const WIDTH_NAMES: Record<Width, 'b1' | 'b2' | 'b4'> = {
  [Width.B1]: 'b1',
  [Width.B2]: 'b2',
  [Width.B4]: 'b4',
};

export const WRITE_OP_NAMES: Record<WriteOp, 'write' | 'clear' | 'set'> = {
  [WriteOp.WRITE]: 'write',
  [WriteOp.CLEAR]: 'clear',
  [WriteOp.SET]: 'set',
};

export const CHECK_COND_NAMES: Record<CheckCond, 'all_clear' | 'any_clear' | 'all_set' | 'any_set'> = {
  [CheckCond.ALL_CLEAR]: 'all_clear',
  [CheckCond.ANY_CLEAR]: 'any_clear',
  [CheckCond.ALL_SET]: 'all_set',
  [CheckCond.ANY_SET]: 'any_set',
};
