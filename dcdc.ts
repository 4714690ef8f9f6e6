/**
 * dcdc — DCD block compiler
 *
 * Usage:
 *   npm run bundle && node dist/dcdc.mjs <file.dcd.json> [options]
 *
 * Options:
 *   --out <path>  Output file (default: input name with .bin)
 *   --hex         Print a hex dump of the block
 *   --disasm      Print one line per record
 *   --json        Output a JSON summary
 *   --quiet       Only show the result line
 */
import { basename, dirname, join } from 'path';
import { loadCommandFile } from './src/core/commandFile';
import { encodeDcd, groupRuns } from './src/core/dcd';
import { disassembleDcd, formatDisassembly } from './src/core/disassembler';
import { hexdump } from './src/core/hexdump';
import { FileSink } from './src/core/sink';
import { CommandFileError, OversizedBlockError } from './src/core/errors';
import type { Command } from './src/core/types';

// ---- Argument parsing ----

const args = process.argv.slice(2);
const outIndex = args.indexOf('--out');
const outArg = outIndex >= 0 ? args[outIndex + 1] : undefined;
const flags = new Set(args.filter(a => a.startsWith('--')));
const files = args.filter((a, i) => !a.startsWith('--') && !(outIndex >= 0 && i === outIndex + 1));

if (files.length === 0 || (outIndex >= 0 && outArg === undefined)) {
  console.error('dcdc — DCD block compiler');
  console.error('');
  console.error('Usage: dcdc <file.dcd.json> [options]');
  console.error('');
  console.error('Options:');
  console.error('  --out <path>  Output file (default: <file>.bin)');
  console.error('  --hex         Print a hex dump of the block');
  console.error('  --disasm      Print one line per record');
  console.error('  --json        Output a JSON summary');
  console.error('  --quiet       Only show the result line');
  process.exit(1);
}

const hex = flags.has('--hex');
const disasm = flags.has('--disasm');
const jsonOut = flags.has('--json');
const quiet = flags.has('--quiet');

const filePath = files[0];
const outPath = outArg ?? join(dirname(filePath), basename(filePath).replace(/(\.dcd)?\.json$/, '') + '.bin');

function fail(message: string): never {
  console.error(`\x1b[31m✗ ${filePath}: ${message}\x1b[0m`);
  process.exit(1);
}

// ---- Load ----

let commands: Command[];
try {
  commands = loadCommandFile(filePath);
} catch (err) {
  if (err instanceof CommandFileError) {
    console.error(`\x1b[31m✗ ${filePath}: ${err.issues.length} error(s)\x1b[0m`);
    for (const issue of err.issues) console.error(`  ${filePath}: ${issue}`);
    process.exit(1);
  }
  fail(`cannot read file (${err instanceof Error ? err.message : String(err)})`);
}

// ---- Encode ----

let bytes: Uint8Array;
try {
  bytes = encodeDcd(commands);
} catch (err) {
  if (err instanceof OversizedBlockError) {
    fail(`${err.message}; split the command list into smaller blocks`);
  }
  throw err;
}

const sink = new FileSink(outPath);
try {
  sink.write(bytes);
} finally {
  sink.close();
}

const records = bytes.length > 0 ? disassembleDcd(bytes) : [];

// ---- JSON output mode ----

if (jsonOut) {
  const out = {
    file: filePath,
    output: outPath,
    commands: commands.length,
    runs: groupRuns(commands).length,
    byteLength: bytes.length,
    records: records.map(r => ({ offset: r.offset, byteLength: r.byteLength, text: r.text })),
  };
  console.log(JSON.stringify(out, null, 2));
  process.exit(0);
}

if (quiet) {
  console.log(`\x1b[32m✓ ${filePath}\x1b[0m`);
  process.exit(0);
}

// ---- Summary ----

console.log(`\x1b[32m✓ ${filePath}\x1b[0m — ${bytes.length} bytes written to ${outPath}`);
console.log(`  ${commands.length} command(s) in ${records.length} record(s)`);

if (disasm && records.length > 0) {
  console.log('');
  console.log('  \x1b[1mRecords:\x1b[0m');
  for (const line of formatDisassembly(records)) console.log(`    ${line}`);
}

if (hex && bytes.length > 0) {
  console.log('');
  console.log('  \x1b[1mHex:\x1b[0m');
  for (const line of hexdump(bytes).split('\n')) console.log(`    ${line}`);
}
