/** Hex listing of an encoded block, 16 bytes per line: `D2 00 30 41 ...`. */
export function hexdump(bytes: Uint8Array, perLine: number = 16): string {
  const lines: string[] = [];
  for (let i = 0; i < bytes.length; i += perLine) {
    let line = '';
    for (const b of bytes.subarray(i, i + perLine)) {
      line += b.toString(16).toUpperCase().padStart(2, '0') + ' ';
    }
    lines.push(line);
  }
  return lines.join('\n');
}
