import { open, stat } from 'node:fs/promises';
import { FseqError } from '../errors.js';
import type { FseqHeader, VariableHeaderRecord } from '../types.js';
import { FIXED_HEADER_BYTES } from './constants.js';
import { decodeFixedHeader, decodeVariableHeader } from './headerCodec.js';

async function readRange(filePath: string, position: number, size: number): Promise<Buffer> {
  const fd = await open(filePath, 'r');
  try {
    const buffer = Buffer.alloc(size);
    let filled = 0;
    while (filled < size) {
      const { bytesRead } = await fd.read(buffer, filled, size - filled, position + filled);
      if (bytesRead === 0) break;
      filled += bytesRead;
    }
    return buffer.subarray(0, filled);
  } finally {
    await fd.close();
  }
}

/** Decode the fixed header. Version and compression are left to the caller. */
export async function readHeader(filePath: string): Promise<FseqHeader> {
  return decodeFixedHeader(await readRange(filePath, 0, FIXED_HEADER_BYTES));
}

/** Read the frame-concatenated channel region, exactly `channelCount × frameCount` bytes. */
export async function readChannelData(filePath: string, header: FseqHeader): Promise<Uint8Array> {
  const expected = header.channelCount * header.frameCount;
  // Checked against the file size before anything is allocated.
  const available = Math.max(0, (await stat(filePath)).size - header.dataOffset);
  const data = available < expected ? undefined : await readRange(filePath, header.dataOffset, expected);
  if (!data || data.length < expected) {
    const actual = data?.length ?? available;
    throw new FseqError(
      'TruncatedChannelData',
      `channel data is ${actual} bytes, header declares ${header.channelCount} ch × ${header.frameCount} frames = ${expected}`,
      `${actual}<${expected}`
    );
  }
  return data;
}

export async function readVariableHeader(filePath: string, header: FseqHeader): Promise<VariableHeaderRecord[]> {
  const length = header.dataOffset - header.variableHeaderOffset;
  if (length <= 0) return [];
  return decodeVariableHeader(await readRange(filePath, header.variableHeaderOffset, length));
}
