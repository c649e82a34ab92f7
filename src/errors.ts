export const FSEQ_ERROR_CODES = [
  'UnsupportedSampleWidth',
  'UnsupportedChannelCount',
  'InvalidWavFile',
  'MissingDecoderDependency',
  'NotAnFseqFile',
  'UnsupportedCompression',
  'UnsupportedVersion',
  'TruncatedChannelData',
  'InvalidFrameRate',
  'FrameSizeMismatch',
] as const;

export type FseqErrorCode = (typeof FSEQ_ERROR_CODES)[number];

/**
 * Unrecoverable failure of an encode, read or merge step.
 * `detail` carries the offending value (magic bytes, version, byte counts).
 */
export class FseqError extends Error {
  code: FseqErrorCode;
  detail?: string;

  constructor(code: FseqErrorCode, message: string, detail?: string) {
    super(message);
    this.name = 'FseqError';
    this.code = code;
    this.detail = detail;
  }
}

export class AudioDecodeError extends Error {
  stderr?: string;

  constructor(message: string, stderr?: string) {
    super(message);
    this.name = 'AudioDecodeError';
    this.stderr = stderr;
  }
}

export const isFseqError = (error: unknown, code?: FseqErrorCode): error is FseqError =>
  error instanceof FseqError && (code === undefined || error.code === code);
