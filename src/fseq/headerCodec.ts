import { FseqError } from '../errors.js';
import type { FseqHeader, VariableHeaderRecord } from '../types.js';
import {
  DATA_ALIGNMENT,
  FIXED_HEADER_BYTES,
  FSEQ_MAGIC,
  FSEQ_MAJOR_VERSION,
  FSEQ_MINOR_VERSION,
  MAX_DATA_OFFSET,
} from './constants.js';

const RECORD_PREFIX_BYTES = 4; // code(2) + length(u16)
const MAX_RECORD_VALUE_BYTES = 0xffff;

export const alignTo = (value: number, boundary = DATA_ALIGNMENT): number =>
  Math.ceil(value / boundary) * boundary;

/** Byte offset of the channel data for a variable header of the given length. */
export function channelDataOffset(variableHeaderLength: number): number {
  const offset = alignTo(FIXED_HEADER_BYTES + variableHeaderLength);
  if (offset > MAX_DATA_OFFSET) {
    throw new RangeError(`variable header too large: channel data offset ${offset} exceeds u16`);
  }
  return offset;
}

export type FixedHeaderFields = Pick<FseqHeader, 'dataOffset' | 'channelCount' | 'frameCount' | 'stepTimeMs'> &
  Partial<FseqHeader>;

/** Fill the fields an uncompressed, non-sparse v2 file always carries. */
export function buildHeader(fields: FixedHeaderFields): FseqHeader {
  return {
    minorVersion: FSEQ_MINOR_VERSION,
    majorVersion: FSEQ_MAJOR_VERSION,
    variableHeaderOffset: FIXED_HEADER_BYTES,
    flags: 0,
    compressionType: 0,
    compressionBlockCount: 0,
    sparseRangeCount: 0,
    reserved: 0,
    uniqueId: 0n,
    ...fields,
  };
}

export function encodeFixedHeader(fields: FixedHeaderFields): Uint8Array {
  const header = buildHeader(fields);
  const buf = Buffer.alloc(FIXED_HEADER_BYTES);
  let offset = buf.write(FSEQ_MAGIC, 0, 'ascii');
  offset = buf.writeUInt16LE(header.dataOffset, offset);
  offset = buf.writeUInt8(header.minorVersion, offset);
  offset = buf.writeUInt8(header.majorVersion, offset);
  offset = buf.writeUInt16LE(header.variableHeaderOffset, offset);
  offset = buf.writeUInt32LE(header.channelCount, offset);
  offset = buf.writeUInt32LE(header.frameCount, offset);
  offset = buf.writeUInt8(header.stepTimeMs, offset);
  offset = buf.writeUInt8(header.flags, offset);
  offset = buf.writeUInt8(header.compressionType, offset);
  offset = buf.writeUInt8(header.compressionBlockCount, offset);
  offset = buf.writeUInt8(header.sparseRangeCount, offset);
  offset = buf.writeUInt8(header.reserved, offset);
  offset = buf.writeBigUInt64LE(header.uniqueId, offset);
  if (offset !== FIXED_HEADER_BYTES) {
    throw new Error(`fixed header size mismatch: ${offset}`);
  }
  return new Uint8Array(buf.buffer, buf.byteOffset, buf.byteLength);
}

export function decodeFixedHeader(bytes: Uint8Array): FseqHeader {
  const buf = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const magic = buf.subarray(0, 4);
  if (magic.toString('latin1') !== FSEQ_MAGIC) {
    throw new FseqError('NotAnFseqFile', `not an FSEQ file (magic: ${describeMagic(magic)})`, magic.toString('hex'));
  }
  if (buf.length < FIXED_HEADER_BYTES) {
    throw new FseqError(
      'NotAnFseqFile',
      `not an FSEQ file (header is ${buf.length} bytes, expected ${FIXED_HEADER_BYTES})`,
      String(buf.length)
    );
  }

  return {
    dataOffset: buf.readUInt16LE(4),
    minorVersion: buf.readUInt8(6),
    majorVersion: buf.readUInt8(7),
    variableHeaderOffset: buf.readUInt16LE(8),
    channelCount: buf.readUInt32LE(10),
    frameCount: buf.readUInt32LE(14),
    stepTimeMs: buf.readUInt8(18),
    flags: buf.readUInt8(19),
    compressionType: buf.readUInt8(20),
    compressionBlockCount: buf.readUInt8(21),
    sparseRangeCount: buf.readUInt8(22),
    reserved: buf.readUInt8(23),
    uniqueId: buf.readBigUInt64LE(24),
  };
}

function describeMagic(magic: Buffer): string {
  if (magic.length === 0) return '<empty>';
  return `0x${magic.toString('hex')} "${magic.toString('latin1').replace(/[^\x20-\x7e]/g, '.')}"`;
}

export function textRecord(code: string, text: string): VariableHeaderRecord {
  return { code, value: new Uint8Array(Buffer.from(`${text}\0`, 'utf-8')) };
}

export function recordText(record: VariableHeaderRecord): string {
  const end = record.value.indexOf(0);
  return Buffer.from(record.value.subarray(0, end < 0 ? record.value.length : end)).toString('utf-8');
}

/** Concatenate records in the given order: code(2) + u16 LE length + value. */
export function encodeVariableHeader(records: readonly VariableHeaderRecord[]): Uint8Array {
  const parts = records.map((record) => {
    if (!/^[\x20-\x7e]{2}$/.test(record.code)) {
      throw new RangeError(`variable header code must be two ASCII characters, got "${record.code}"`);
    }
    if (record.value.length > MAX_RECORD_VALUE_BYTES) {
      throw new RangeError(`variable header "${record.code}" value is ${record.value.length} bytes (max 65535)`);
    }
    const prefix = Buffer.alloc(RECORD_PREFIX_BYTES);
    prefix.write(record.code, 0, 'ascii');
    prefix.writeUInt16LE(record.value.length, 2);
    return Buffer.concat([prefix, record.value]);
  });
  const joined = Buffer.concat(parts);
  return new Uint8Array(joined.buffer, joined.byteOffset, joined.byteLength);
}

export function decodeVariableHeader(bytes: Uint8Array): VariableHeaderRecord[] {
  const buf = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const records: VariableHeaderRecord[] = [];
  let offset = 0;
  while (offset + RECORD_PREFIX_BYTES <= buf.length) {
    const length = buf.readUInt16LE(offset + 2);
    const end = offset + RECORD_PREFIX_BYTES + length;
    if (end > buf.length) break;
    const code = buf.toString('latin1', offset, offset + 2);
    // Alignment padding after the last record reads as a zero code.
    if (code === '\0\0' && length === 0) break;
    records.push({ code, value: new Uint8Array(buf.subarray(offset + RECORD_PREFIX_BYTES, end)) });
    offset = end;
  }
  return records;
}
