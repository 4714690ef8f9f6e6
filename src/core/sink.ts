/**
 * Byte sinks for the DCD encoder.
 *
 * A sink accepts sequential synchronous writes. Any exception thrown by
 * `write` aborts the encode and reaches the caller unchanged.
 */
import { closeSync, openSync, writeSync } from 'fs';

export interface ByteSink {
  write: (bytes: Uint8Array) => void;
}

const INITIAL_CAPACITY = 256;

/** Growable in-memory sink. */
export class BufferSink implements ByteSink {
  private buf: Uint8Array;
  private len = 0;

  constructor(capacity: number = INITIAL_CAPACITY) {
    this.buf = new Uint8Array(Math.max(1, capacity));
  }

  get length(): number {
    return this.len;
  }

  write(bytes: Uint8Array): void {
    const needed = this.len + bytes.length;
    if (needed > this.buf.length) {
      let capacity = this.buf.length;
      while (capacity < needed) capacity *= 2;
      const grown = new Uint8Array(capacity);
      grown.set(this.buf.subarray(0, this.len));
      this.buf = grown;
    }
    this.buf.set(bytes, this.len);
    this.len = needed;
  }

  /** Copy of everything written so far. */
  bytes(): Uint8Array {
    return this.buf.slice(0, this.len);
  }

  reset(): void {
    this.len = 0;
  }
}

/** Sink writing straight to a file descriptor. The owner must `close()` it. */
export class FileSink implements ByteSink {
  private fd: number | null;

  constructor(path: string) {
    this.fd = openSync(path, 'w');
  }

  write(bytes: Uint8Array): void {
    if (this.fd === null) throw new Error('FileSink is closed');
    let offset = 0;
    while (offset < bytes.length) {
      offset += writeSync(this.fd, bytes, offset, bytes.length - offset);
    }
  }

  close(): void {
    if (this.fd === null) return;
    closeSync(this.fd);
    this.fd = null;
  }
}
