/**
 * Record listing for encoded DCD blocks.
 * Reads back the exact layout `writeDcd` produces; it never executes anything.
 */
import {
  BLOCK_PARAM, CHECK_COND_NAMES, CHECK_COUNT_SIZE, CHECK_SIZE, HEADER_SIZE,
  NOP_SIZE, OP_MASK, TAG, WIDTH_MASK, WIDTH_NAMES, WRITE_ENTRY_SIZE, WRITE_OP_NAMES,
} from './constants';
import { CheckCond, Width, WriteOp } from './types';

export interface DisassembledRecord {
  offset: number;
  byteLength: number;
  text: string;
}

const WIDTHS: readonly Width[] = Object.values(Width);
const WRITE_OPS: readonly WriteOp[] = Object.values(WriteOp);
const CHECK_CONDS: readonly CheckCond[] = Object.values(CheckCond);

function hex32(n: number): string {
  return '0x' + (n >>> 0).toString(16).padStart(8, '0');
}

function decodeWidth(flags: number, offset: number): Width {
  const width = WIDTHS.find(w => w === (flags & WIDTH_MASK));
  if (width === undefined) throw new Error(`Invalid width in flags 0x${flags.toString(16)} at offset ${offset}`);
  return width;
}

function decodeWriteOp(flags: number, offset: number): WriteOp {
  const op = WRITE_OPS.find(o => o === (flags & OP_MASK));
  if (op === undefined) throw new Error(`Invalid write op in flags 0x${flags.toString(16)} at offset ${offset}`);
  return op;
}

function decodeCheckCond(flags: number): CheckCond {
  // Every 2-bit value is a valid condition
  const cond = CHECK_CONDS.find(c => c === (flags & OP_MASK));
  return cond ?? CheckCond.ALL_CLEAR;
}

/**
 * Split a DCD block into records.
 * Throws on a header or record that this encoder would never have written.
 */
export function disassembleDcd(bytes: Uint8Array): DisassembledRecord[] {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  if (bytes.length < HEADER_SIZE || view.getUint8(0) !== TAG.BLOCK || view.getUint8(3) !== BLOCK_PARAM) {
    throw new Error('Not a DCD block: bad header');
  }
  const blockLength = view.getUint16(1, false);
  if (blockLength > bytes.length) {
    throw new Error(`Truncated DCD block: header says ${blockLength} bytes, got ${bytes.length}`);
  }

  const records: DisassembledRecord[] = [];
  let offset = HEADER_SIZE;
  while (offset < blockLength) {
    if (offset + HEADER_SIZE > blockLength) {
      throw new Error(`Truncated record header at offset ${offset}`);
    }
    const tag = view.getUint8(offset);
    const len = view.getUint16(offset + 1, false);
    const flags = view.getUint8(offset + 3);
    if (len < HEADER_SIZE || offset + len > blockLength) {
      throw new Error(`Bad record length ${len} at offset ${offset}`);
    }

    let text: string;
    switch (tag) {
      case TAG.NOP: {
        if (len !== NOP_SIZE) throw new Error(`Bad nop length ${len} at offset ${offset}`);
        text = 'nop';
        break;
      }
      case TAG.CHECK: {
        if (len !== CHECK_SIZE && len !== CHECK_COUNT_SIZE) {
          throw new Error(`Bad check length ${len} at offset ${offset}`);
        }
        const width = WIDTH_NAMES[decodeWidth(flags, offset)];
        const cond = CHECK_COND_NAMES[decodeCheckCond(flags)];
        const address = view.getUint32(offset + 4, false);
        const mask = view.getUint32(offset + 8, false);
        text = `check.${width}.${cond} ${hex32(address)} mask=${hex32(mask)}`;
        if (len === CHECK_COUNT_SIZE) text += ` count=${view.getUint32(offset + 12, false)}`;
        break;
      }
      case TAG.WRITE: {
        if ((len - HEADER_SIZE) % WRITE_ENTRY_SIZE !== 0 || len === HEADER_SIZE) {
          throw new Error(`Bad write length ${len} at offset ${offset}`);
        }
        const width = WIDTH_NAMES[decodeWidth(flags, offset)];
        const op = WRITE_OP_NAMES[decodeWriteOp(flags, offset)];
        const entries: string[] = [];
        for (let p = offset + HEADER_SIZE; p < offset + len; p += WRITE_ENTRY_SIZE) {
          entries.push(`${hex32(view.getUint32(p, false))}=${hex32(view.getUint32(p + 4, false))}`);
        }
        text = `write.${width}.${op} ${entries.join(' ')}`;
        break;
      }
      default:
        throw new Error(`Unknown record tag 0x${tag.toString(16)} at offset ${offset}`);
    }

    records.push({ offset, byteLength: len, text });
    offset += len;
  }
  return records;
}

/** One line per record, prefixed with its byte offset. */
export function formatDisassembly(records: readonly DisassembledRecord[]): string[] {
  return records.map(r => `${r.offset.toString(16).padStart(4, '0')}: ${r.text}`);
}
