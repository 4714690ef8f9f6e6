import { describe, it, expect } from 'vitest';
import { check, encodeDcd, nop, write } from './dcd';
import { disassembleDcd, formatDisassembly } from './disassembler';
import { hexdump } from './hexdump';
import { CheckCond, Width, WriteOp } from './types';

const block = encodeDcd([
  nop(),
  write(0x01234567, 0xdeadbeef),
  check(0x89abcdef, 0x55aa55aa, CheckCond.ANY_SET, Width.B2, 16),
  check(0x89abcdef, 0x55aa55aa, CheckCond.ANY_CLEAR, Width.B1),
]);

describe('disassembleDcd', () => {
  it('lists one entry per record', () => {
    expect(disassembleDcd(block)).toEqual([
      { offset: 4, byteLength: 4, text: 'nop' },
      { offset: 8, byteLength: 12, text: 'write.b4.write 0x01234567=0xdeadbeef' },
      { offset: 20, byteLength: 16, text: 'check.b2.any_set 0x89abcdef mask=0x55aa55aa count=16' },
      { offset: 36, byteLength: 12, text: 'check.b1.any_clear 0x89abcdef mask=0x55aa55aa' },
    ]);
  });

  it('lists every entry of a merged write', () => {
    const records = disassembleDcd(encodeDcd([
      write(0x10, 1, Width.B2, WriteOp.CLEAR),
      write(0x20, 2, Width.B2, WriteOp.CLEAR),
    ]));
    expect(records.map(r => r.text)).toEqual(['write.b2.clear 0x00000010=0x00000001 0x00000020=0x00000002']);
  });

  it('formats records with hex offsets', () => {
    expect(formatDisassembly(disassembleDcd(block))).toEqual([
      '0004: nop',
      '0008: write.b4.write 0x01234567=0xdeadbeef',
      '0014: check.b2.any_set 0x89abcdef mask=0x55aa55aa count=16',
      '0024: check.b1.any_clear 0x89abcdef mask=0x55aa55aa',
    ]);
  });

  it('rejects a block with a foreign header', () => {
    expect(() => disassembleDcd(new Uint8Array([0xD1, 0, 4, 0x41]))).toThrow('Not a DCD block: bad header');
  });

  it('rejects a truncated block', () => {
    expect(() => disassembleDcd(block.subarray(0, 40))).toThrow('Truncated DCD block: header says 48 bytes, got 40');
  });

  it('rejects unknown record tags', () => {
    const bytes = new Uint8Array([0xD2, 0, 8, 0x41, 0xCA, 0, 4, 0]);
    expect(() => disassembleDcd(bytes)).toThrow('Unknown record tag 0xca at offset 4');
  });

  it('rejects a write record with an invalid op', () => {
    const bytes = new Uint8Array([0xD2, 0, 16, 0x41, 0xCC, 0, 12, 0x14, 0, 0, 0, 0, 0, 0, 0, 0]);
    expect(() => disassembleDcd(bytes)).toThrow('Invalid write op in flags 0x14 at offset 4');
  });
});

describe('hexdump', () => {
  it('prints 16 upper-case bytes per line', () => {
    expect(hexdump(block).split('\n')).toEqual([
      'D2 00 30 41 C0 00 04 00 CC 00 0C 04 01 23 45 67 ',
      'DE AD BE EF CF 00 10 1A 89 AB CD EF 55 AA 55 AA ',
      '00 00 00 10 CF 00 0C 09 89 AB CD EF 55 AA 55 AA ',
    ]);
  });

  it('prints nothing for no bytes', () => {
    expect(hexdump(new Uint8Array(0))).toBe('');
  });

  it('leaves a short last line', () => {
    expect(hexdump(new Uint8Array([1, 2, 3]), 2)).toBe('01 02 \n03 ');
  });
});
