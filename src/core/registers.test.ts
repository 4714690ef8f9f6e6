import { describe, it, expect } from 'vitest';
import { encodeDcd } from './dcd';
import {
  buildValue,
  checkAllClear,
  checkAllSet,
  checkAnyClear,
  checkAnySet,
  clearReg,
  setReg,
  widthFromBits,
  withCount,
  writeReg,
} from './registers';
import type { RegisterDef } from './registers';
import { CheckCond, Width, WriteOp } from './types';

const PLL_CTRL: RegisterDef = {
  address: 0x400D8000,
  width: Width.B4,
  fields: {
    BYPASS: { offset: 16, mask: 0x0001_0000 },
    BYPASS_CLK_SRC: { offset: 14, mask: 0x0000_C000 },
    ENABLE: { offset: 13, mask: 0x0000_2000 },
    DIV_SELECT: { offset: 0, mask: 0x0000_007F },
    LOCK: { offset: 31, mask: 0x8000_0000 },
  },
};

const STATUS16: RegisterDef = {
  address: 0x400FC048,
  width: widthFromBits(16),
  fields: {
    BUSY: { offset: 0, mask: 0x0001 },
    READY: { offset: 5, mask: 0x0020 },
  },
};

describe('buildValue', () => {
  it('shifts field values into place and masks them', () => {
    expect(buildValue(PLL_CTRL, [{ field: 'BYPASS_CLK_SRC', value: 1 }])).toBe(0x4000);
    expect(buildValue(PLL_CTRL, [{ field: 'DIV_SELECT', value: 0xFF }])).toBe(0x7F);
  });

  it('uses the whole mask for a bare field', () => {
    expect(buildValue(PLL_CTRL, [{ field: 'BYPASS' }])).toBe(0x10000);
  });

  it('ORs fields and raw numbers together', () => {
    expect(buildValue(PLL_CTRL, [{ field: 'BYPASS' }, { field: 'DIV_SELECT', value: 0x20 }, 0x100])).toBe(0x10120);
  });

  it('keeps the top bit unsigned', () => {
    expect(buildValue(PLL_CTRL, [{ field: 'LOCK', value: 1 }])).toBe(0x80000000);
  });

  it('rejects unknown fields', () => {
    expect(() => buildValue(PLL_CTRL, [{ field: 'NOPE' }])).toThrow("Unknown field 'NOPE' in register at 0x400d8000");
  });
});

describe('write builders', () => {
  it('writeReg overwrites the register', () => {
    expect(writeReg(PLL_CTRL, { field: 'BYPASS' }, { field: 'BYPASS_CLK_SRC', value: 1 })).toEqual({
      kind: 'write', width: Width.B4, op: WriteOp.WRITE, address: 0x400D8000, value: 0x14000,
    });
  });

  it('setReg and clearReg pick the read-modify-write ops', () => {
    expect(setReg(PLL_CTRL, { field: 'ENABLE' }).op).toBe(WriteOp.SET);
    expect(setReg(PLL_CTRL, { field: 'ENABLE' }).value).toBe(0x2000);
    expect(clearReg(PLL_CTRL, { field: 'BYPASS' }).op).toBe(WriteOp.CLEAR);
  });
});

describe('check builders', () => {
  it('build indefinite polls on the register width', () => {
    const cmd = checkAllClear(STATUS16, { field: 'BUSY' });
    expect(cmd).toEqual({
      kind: 'check', width: Width.B2, cond: CheckCond.ALL_CLEAR, address: 0x400FC048, mask: 0x0001,
    });
    expect(cmd.count).toBeUndefined();
  });

  it('map each builder to its condition', () => {
    expect(checkAnyClear(STATUS16, { field: 'BUSY' }).cond).toBe(CheckCond.ANY_CLEAR);
    expect(checkAllSet(STATUS16, { field: 'READY' }).cond).toBe(CheckCond.ALL_SET);
    expect(checkAnySet(STATUS16, { field: 'READY' }).cond).toBe(CheckCond.ANY_SET);
  });

  it('withCount bounds a poll without touching the original', () => {
    const poll = checkAllSet(STATUS16, { field: 'READY' });
    const bounded = withCount(poll, 100);
    expect(bounded.count).toBe(100);
    expect(poll.count).toBeUndefined();
  });
});

describe('widthFromBits', () => {
  it('maps register sizes to widths', () => {
    expect(widthFromBits(8)).toBe(Width.B1);
    expect(widthFromBits(16)).toBe(Width.B2);
    expect(widthFromBits(32)).toBe(Width.B4);
  });
});

describe('builders feed the encoder', () => {
  it('adjacent writeReg commands merge into one record', () => {
    const bytes = encodeDcd([
      writeReg(PLL_CTRL, { field: 'BYPASS' }),
      writeReg(PLL_CTRL, { field: 'DIV_SELECT', value: 0x58 }),
      setReg(PLL_CTRL, { field: 'ENABLE' }),
      withCount(checkAllSet(STATUS16, { field: 'READY' }), 16),
    ]);
    expect(Array.from(bytes)).toEqual([
      0xD2, 0, 52, 0x41,
      0xCC, 0, 20, 0x04,
      0x40, 0x0D, 0x80, 0x00, 0x00, 0x01, 0x00, 0x00,
      0x40, 0x0D, 0x80, 0x00, 0x00, 0x00, 0x00, 0x58,
      0xCC, 0, 12, 0x1C,
      0x40, 0x0D, 0x80, 0x00, 0x00, 0x00, 0x20, 0x00,
      0xCF, 0, 16, 0x12,
      0x40, 0x0F, 0xC0, 0x48, 0x00, 0x00, 0x00, 0x20,
      0, 0, 0, 16,
    ]);
  });
});
