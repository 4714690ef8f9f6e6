import { MAX_BLOCK_SIZE } from './constants';

/**
 * Thrown when the encoded block would not fit the 16-bit length field of the
 * block header. Nothing has been written to the sink when this is raised.
 */
export class OversizedBlockError extends Error {
  byteLength: number;
  constructor(byteLength: number) {
    super(`DCD byte length too large: ${byteLength} > ${MAX_BLOCK_SIZE}`);
    this.name = 'OversizedBlockError';
    this.byteLength = byteLength;
  }
}

export class CommandFileError extends Error {
  issues: string[];
  constructor(issues: string[], message?: string) {
    super(message ?? `Invalid command file: ${issues.join('; ')}`);
    this.name = 'CommandFileError';
    this.issues = issues;
  }
}
