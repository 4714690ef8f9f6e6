// 32-bit unsigned quantity (stored as standard JS number, masked with >>> 0)
export type U32 = number;

// Flag byte bits [2:0]: bus width of the read/write
export const Width = {
  B1: 0b001,
  B2: 0b010,
  B4: 0b100,
} as const;
export type Width = typeof Width[keyof typeof Width];

// Flag byte bits [4:3]: write operation
export const WriteOp = {
  /** `*address = value` */
  WRITE: 0b00_000,
  /** `*address &= ~value` (read-modify-write) */
  CLEAR: 0b01_000,
  /** `*address |= value` (read-modify-write) */
  SET: 0b11_000,
} as const;
export type WriteOp = typeof WriteOp[keyof typeof WriteOp];

// Flag byte bits [4:3]: poll condition, same bit range as WriteOp
export const CheckCond = {
  /** `(*address & mask) == 0` */
  ALL_CLEAR: 0b00_000,
  /** `(*address & mask) != mask` */
  ANY_CLEAR: 0b01_000,
  /** `(*address & mask) == mask` */
  ALL_SET: 0b10_000,
  /** `(*address & mask) != 0` */
  ANY_SET: 0b11_000,
} as const;
export type CheckCond = typeof CheckCond[keyof typeof CheckCond];

export interface NopCommand {
  kind: 'nop';
}

export interface WriteCommand {
  kind: 'write';
  width: Width;
  op: WriteOp;
  /** The ROM may reject addresses outside its allowed ranges. */
  address: U32;
  value: U32;
}

export interface CheckCommand {
  kind: 'check';
  width: Width;
  cond: CheckCond;
  /** Any address is valid for a read. */
  address: U32;
  mask: U32;
  /**
   * Poll count. Absent polls forever; 0 behaves like a nop but is still
   * encoded as a full check record; otherwise the ROM abandons the rest of
   * the block once `count` polls fail.
   */
  count?: U32;
}

export type Command = NopCommand | WriteCommand | CheckCommand;

/** A maximal group of commands that encodes to exactly one record. */
export type Run =
  | { kind: 'nop' }
  | { kind: 'check'; check: CheckCommand }
  | { kind: 'write'; width: Width; op: WriteOp; writes: WriteCommand[] };
