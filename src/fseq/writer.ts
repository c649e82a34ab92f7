import { open, rename, unlink } from 'node:fs/promises';
import path from 'node:path';
import { randomUUID } from 'node:crypto';
import { logger } from '../logger.js';
import { assertFrameSize } from './frameEncoder.js';
import { channelDataOffset, encodeFixedHeader } from './headerCodec.js';

const WRITE_BATCH_BYTES = 4 * 1024 * 1024;

export interface FseqLayout {
  channelCount: number;
  frameCount: number;
  stepTimeMs: number;
  variableHeader: Uint8Array;
}

/**
 * Write header, variable header, alignment padding and then `rows` in order.
 * Each row is checked against `channelCount` as it is written. A bad row, or
 * an error thrown while producing the next row, leaves the rows before it on disk.
 */
export async function writeFseqFile(
  outputPath: string,
  layout: FseqLayout,
  rows: Iterable<Uint8Array>
): Promise<number> {
  const dataOffset = channelDataOffset(layout.variableHeader.length);
  const header = encodeFixedHeader({
    dataOffset,
    channelCount: layout.channelCount,
    frameCount: layout.frameCount,
    stepTimeMs: layout.stepTimeMs,
  });
  const padding = new Uint8Array(dataOffset - header.length - layout.variableHeader.length);

  const fd = await open(outputPath, 'w');
  try {
    await fd.write(Buffer.concat([header, layout.variableHeader, padding]));

    let pending: Uint8Array[] = [];
    let pendingBytes = 0;
    const flush = async () => {
      if (pending.length === 0) return;
      const batch = Buffer.concat(pending, pendingBytes);
      pending = [];
      pendingBytes = 0;
      await fd.write(batch);
    };

    let index = 0;
    try {
      for (const row of rows) {
        assertFrameSize(row, layout.channelCount, index);
        pending.push(row);
        pendingBytes += row.length;
        index += 1;
        if (pendingBytes >= WRITE_BATCH_BYTES) {
          await flush();
        }
      }
    } catch (error) {
      // Rows accepted before the failure, whether from the size check or from `rows` itself, still reach disk.
      await flush();
      throw error;
    }
    await flush();
    if (index !== layout.frameCount) {
      throw new Error(`wrote ${index} rows but the header declares ${layout.frameCount}`);
    }
  } finally {
    await fd.close();
  }

  const totalBytes = dataOffset + layout.frameCount * layout.channelCount;
  logger.debug({ outputPath, dataOffset, ...layoutSummary(layout), totalBytes }, 'fseq written');
  return totalBytes;
}

const layoutSummary = (layout: FseqLayout) => ({
  channelCount: layout.channelCount,
  frameCount: layout.frameCount,
  stepTimeMs: layout.stepTimeMs,
});

export async function writeStandalone(
  outputPath: string,
  frames: readonly Uint8Array[],
  channelsPerFrame: number,
  stepTimeMs: number,
  variableHeader: Uint8Array
): Promise<number> {
  return writeFseqFile(
    outputPath,
    { channelCount: channelsPerFrame, frameCount: frames.length, stepTimeMs, variableHeader },
    frames
  );
}

/**
 * Run `write` against a sibling temp path and rename it over `outputPath` once it
 * succeeds. The temp file is removed when `write` fails.
 */
export async function writeAtomically<T>(outputPath: string, write: (tmpPath: string) => Promise<T>): Promise<T> {
  const tmpPath = path.join(path.dirname(outputPath), `.${path.basename(outputPath)}.${randomUUID()}.tmp`);
  try {
    const result = await write(tmpPath);
    await rename(tmpPath, outputPath);
    return result;
  } catch (error) {
    await unlink(tmpPath).catch(() => undefined);
    throw error;
  }
}
