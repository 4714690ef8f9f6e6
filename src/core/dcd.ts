/**
 * DCD (Device Configuration Data) block encoder.
 *
 * Turns a list of Write / Check / Nop commands into the block the boot ROM
 * interprets at power-on: a 4-byte block header followed by one record per
 * run. Consecutive writes sharing width and op are folded into a single
 * multi-entry write record.
 */

import {
  BLOCK_PARAM, CHECK_COUNT_SIZE, CHECK_SIZE, HEADER_SIZE, MAX_BLOCK_SIZE,
  NOP_SIZE, TAG, WRITE_ENTRY_SIZE,
} from './constants';
import { OversizedBlockError } from './errors';
import { BufferSink } from './sink';
import type { ByteSink } from './sink';
import { CheckCond, Width, WriteOp } from './types';
import type { CheckCommand, Command, NopCommand, Run, U32, WriteCommand } from './types';

// ---------------------------------------------------------------------------
// Command constructors
// ---------------------------------------------------------------------------

export function nop(): NopCommand {
  return { kind: 'nop' };
}

export function write(
  address: U32,
  value: U32,
  width: Width = Width.B4,
  op: WriteOp = WriteOp.WRITE,
): WriteCommand {
  return { kind: 'write', width, op, address, value };
}

export function check(
  address: U32,
  mask: U32,
  cond: CheckCond = CheckCond.ALL_CLEAR,
  width: Width = Width.B4,
  count?: U32,
): CheckCommand {
  const cmd: CheckCommand = { kind: 'check', width, cond, address, mask };
  if (count !== undefined) cmd.count = count;
  return cmd;
}

// ---------------------------------------------------------------------------
// Grouping
// ---------------------------------------------------------------------------

/**
 * Partition commands into maximal runs. Only adjacent writes with identical
 * width and op share a run; nops and checks are always singletons.
 */
export function groupRuns(commands: readonly Command[]): Run[] {
  const runs: Run[] = [];
  let current: Extract<Run, { kind: 'write' }> | null = null;

  for (const cmd of commands) {
    if (cmd.kind !== 'write') {
      current = null;
      runs.push(cmd.kind === 'nop' ? { kind: 'nop' } : { kind: 'check', check: cmd });
      continue;
    }
    if (current && current.width === cmd.width && current.op === cmd.op) {
      current.writes.push(cmd);
    } else {
      current = { kind: 'write', width: cmd.width, op: cmd.op, writes: [cmd] };
      runs.push(current);
    }
  }
  return runs;
}

// ---------------------------------------------------------------------------
// Sizing
// ---------------------------------------------------------------------------

export function recordByteLength(run: Run): number {
  switch (run.kind) {
    case 'nop':
      return NOP_SIZE;
    case 'check':
      return run.check.count !== undefined ? CHECK_COUNT_SIZE : CHECK_SIZE;
    case 'write':
      return HEADER_SIZE + run.writes.length * WRITE_ENTRY_SIZE;
  }
}

/** Total block length including the block header; 0 when there are no runs. */
export function blockByteLength(runs: readonly Run[]): number {
  if (runs.length === 0) return 0;
  let total = HEADER_SIZE;
  for (const run of runs) total += recordByteLength(run);
  return total;
}

// ---------------------------------------------------------------------------
// Record encoding
// ---------------------------------------------------------------------------

function header(tag: number, byteLength: number, param: number): Uint8Array {
  const bytes = new Uint8Array(HEADER_SIZE);
  const view = new DataView(bytes.buffer);
  view.setUint8(0, tag);
  view.setUint16(1, byteLength, false);
  view.setUint8(3, param);
  return bytes;
}

export function blockHeader(byteLength: number): Uint8Array {
  return header(TAG.BLOCK, byteLength, BLOCK_PARAM);
}

/** Encode one run as a complete record (header + payload). */
export function encodeRecord(run: Run): Uint8Array {
  const byteLength = recordByteLength(run);
  if (run.kind === 'nop') return header(TAG.NOP, byteLength, 0);

  const bytes = new Uint8Array(byteLength);
  const view = new DataView(bytes.buffer);

  if (run.kind === 'check') {
    const { check: cmd } = run;
    bytes.set(header(TAG.CHECK, byteLength, cmd.width | cmd.cond), 0);
    view.setUint32(4, cmd.address >>> 0, false);
    view.setUint32(8, cmd.mask >>> 0, false);
    if (cmd.count !== undefined) view.setUint32(12, cmd.count >>> 0, false);
    return bytes;
  }

  bytes.set(header(TAG.WRITE, byteLength, run.width | run.op), 0);
  let offset = HEADER_SIZE;
  for (const entry of run.writes) {
    view.setUint32(offset, entry.address >>> 0, false);
    view.setUint32(offset + 4, entry.value >>> 0, false);
    offset += WRITE_ENTRY_SIZE;
  }
  return bytes;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Serialize commands as a complete DCD block into `sink`.
 *
 * Returns the number of bytes written, which equals the length stored in the
 * block header. An empty command list writes nothing and returns 0.
 *
 * @throws OversizedBlockError before any byte is written when the block
 *   exceeds 65535 bytes. Errors thrown by the sink propagate as-is and may
 *   leave a partial block behind.
 */
export function writeDcd(sink: ByteSink, commands: readonly Command[]): number {
  const runs = groupRuns(commands);
  const byteLength = blockByteLength(runs);
  if (byteLength === 0) return 0;
  if (byteLength > MAX_BLOCK_SIZE) throw new OversizedBlockError(byteLength);

  sink.write(blockHeader(byteLength));
  for (const run of runs) {
    sink.write(encodeRecord(run));
  }
  return byteLength;
}

/** Encode commands into a fresh byte array. */
export function encodeDcd(commands: readonly Command[]): Uint8Array {
  const sink = new BufferSink();
  writeDcd(sink, commands);
  return sink.bytes();
}
