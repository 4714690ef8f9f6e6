/**
 * JSON command files: `{ "commands": [ ... ] }`.
 *
 * Integers may be JSON numbers or `0x` hex strings. Omitted fields take the
 * same defaults as the command constructors (b4, write, all_clear).
 */
import { readFileSync } from 'fs';
import Ajv from 'ajv';
import { CHECK_COND_NAMES, WIDTH_NAMES, WRITE_OP_NAMES } from './constants';
import { check, nop, write } from './dcd';
import { CommandFileError } from './errors';
import { CheckCond, Width, WriteOp } from './types';
import type { Command, U32 } from './types';

type WidthName = typeof WIDTH_NAMES[Width];
type WriteOpName = typeof WRITE_OP_NAMES[WriteOp];
type CheckCondName = typeof CHECK_COND_NAMES[CheckCond];
type RawInt = number | string;

type RawCommand =
  | { kind: 'nop' }
  | { kind: 'write'; width?: WidthName; op?: WriteOpName; address: RawInt; value: RawInt }
  | { kind: 'check'; width?: WidthName; cond?: CheckCondName; address: RawInt; mask: RawInt; count?: RawInt };

export interface RawCommandFile {
  description?: string;
  commands: RawCommand[];
}

const u32Schema = {
  anyOf: [
    { type: 'integer', minimum: 0, maximum: 0xFFFFFFFF },
    { type: 'string', pattern: '^0[xX][0-9a-fA-F]{1,8}$' },
  ],
};

export const commandFileSchema = {
  type: 'object',
  additionalProperties: false,
  required: ['commands'],
  properties: {
    description: { type: 'string' },
    commands: {
      type: 'array',
      items: {
        type: 'object',
        discriminator: { propertyName: 'kind' },
        required: ['kind'],
        oneOf: [
          {
            type: 'object',
            additionalProperties: false,
            properties: { kind: { const: 'nop' } },
          },
          {
            type: 'object',
            additionalProperties: false,
            required: ['address', 'value'],
            properties: {
              kind: { const: 'write' },
              width: { enum: Object.values(WIDTH_NAMES) },
              op: { enum: Object.values(WRITE_OP_NAMES) },
              address: u32Schema,
              value: u32Schema,
            },
          },
          {
            type: 'object',
            additionalProperties: false,
            required: ['address', 'mask'],
            properties: {
              kind: { const: 'check' },
              width: { enum: Object.values(WIDTH_NAMES) },
              cond: { enum: Object.values(CHECK_COND_NAMES) },
              address: u32Schema,
              mask: u32Schema,
              count: u32Schema,
            },
          },
        ],
      },
    },
  },
};

const ajv = new Ajv({ allErrors: true, discriminator: true });
const validateCommandFile = ajv.compile<RawCommandFile>(commandFileSchema);

// Reverse lookups: name → flag bits
function invert<K extends number, V extends string>(names: Record<K, V>, values: readonly K[]): Map<V, K> {
  return new Map(values.map(v => [names[v], v]));
}

const WIDTH_BY_NAME = invert(WIDTH_NAMES, Object.values(Width));
const WRITE_OP_BY_NAME = invert(WRITE_OP_NAMES, Object.values(WriteOp));
const CHECK_COND_BY_NAME = invert(CHECK_COND_NAMES, Object.values(CheckCond));

function toU32(raw: RawInt): U32 {
  return typeof raw === 'number' ? raw : parseInt(raw.slice(2), 16);
}

function lookup<V extends string, K>(map: Map<V, K>, name: V | undefined, fallback: K): K {
  return name === undefined ? fallback : map.get(name) ?? fallback;
}

function toCommand(raw: RawCommand): Command {
  switch (raw.kind) {
    case 'nop':
      return nop();
    case 'write':
      return write(
        toU32(raw.address),
        toU32(raw.value),
        lookup(WIDTH_BY_NAME, raw.width, Width.B4),
        lookup(WRITE_OP_BY_NAME, raw.op, WriteOp.WRITE),
      );
    case 'check':
      return check(
        toU32(raw.address),
        toU32(raw.mask),
        lookup(CHECK_COND_BY_NAME, raw.cond, CheckCond.ALL_CLEAR),
        lookup(WIDTH_BY_NAME, raw.width, Width.B4),
        raw.count === undefined ? undefined : toU32(raw.count),
      );
  }
}

/** Validate parsed JSON and convert it to commands. */
export function commandsFromJson(data: unknown): Command[] {
  if (!validateCommandFile(data)) {
    const issues = (validateCommandFile.errors ?? []).map(
      e => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`,
    );
    throw new CommandFileError(issues);
  }
  return data.commands.map(toCommand);
}

export function parseCommandFile(text: string): Command[] {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new CommandFileError([message], `Command file is not valid JSON: ${message}`);
  }
  return commandsFromJson(data);
}

export function loadCommandFile(path: string): Command[] {
  return parseCommandFile(readFileSync(path, 'utf-8'));
}
