import { FseqError } from '../errors.js';
import { logger } from '../logger.js';
import type { GridDimensions, MergeResult } from '../types.js';
import { FSEQ_MAJOR_VERSION, MEDIA_FILE_TAG, MERGED_MEDIA_NAME, SOURCE_TAG } from './constants.js';
import { assertFrameSize } from './frameEncoder.js';
import { encodeVariableHeader, textRecord } from './headerCodec.js';
import { readChannelData, readHeader } from './reader.js';
import { writeFseqFile } from './writer.js';

export interface MergeInput {
  light: Uint8Array;
  lightGrid: GridDimensions;
  audioFrames: readonly Uint8Array[];
  audioChannelsPerFrame: number;
  startChannel: number;
}

export function mergedDimensions(input: Omit<MergeInput, 'light'>): GridDimensions {
  return {
    channels: Math.max(input.lightGrid.channels, input.startChannel + input.audioChannelsPerFrame),
    frames: Math.max(input.lightGrid.frames, input.audioFrames.length),
  };
}

/**
 * Build output row `frame`: zeros, the light row at channel 0, then the audio
 * frame at `startChannel`. Audio overwrites any light bytes it overlaps.
 */
export function mergeRow(input: MergeInput, totalChannels: number, frame: number): Uint8Array {
  const row = new Uint8Array(totalChannels);
  const { channels: lightChannels, frames: lightFrames } = input.lightGrid;
  if (frame < lightFrames) {
    const start = frame * lightChannels;
    row.set(input.light.subarray(start, start + lightChannels), 0);
  }
  if (frame < input.audioFrames.length) {
    const audio = input.audioFrames[frame];
    assertFrameSize(audio, input.audioChannelsPerFrame, frame);
    row.set(audio, input.startChannel);
  }
  return row;
}

export function* mergeRows(input: MergeInput): Generator<Uint8Array> {
  const { channels, frames } = mergedDimensions(input);
  for (let frame = 0; frame < frames; frame += 1) {
    yield mergeRow(input, channels, frame);
  }
}

export async function mergeIntoFseq(options: {
  audioFrames: readonly Uint8Array[];
  audioChannelsPerFrame: number;
  existingPath: string;
  outputPath: string;
  startChannel: number;
  producer: string;
}): Promise<MergeResult> {
  const { audioFrames, audioChannelsPerFrame, existingPath, outputPath, startChannel, producer } = options;
  if (!Number.isInteger(startChannel) || startChannel < 0) {
    throw new RangeError(`start channel must be a non-negative integer, got ${startChannel}`);
  }

  const header = await readHeader(existingPath);
  if (header.compressionType !== 0) {
    throw new FseqError(
      'UnsupportedCompression',
      `cannot merge into a compressed FSEQ file (compression type ${header.compressionType}); decompress it first`,
      String(header.compressionType)
    );
  }
  if (header.majorVersion !== FSEQ_MAJOR_VERSION) {
    throw new FseqError(
      'UnsupportedVersion',
      `only FSEQ v2 is supported, got v${header.majorVersion}.${header.minorVersion}`,
      `${header.majorVersion}.${header.minorVersion}`
    );
  }

  const light = await readChannelData(existingPath, header);
  const input: MergeInput = {
    light,
    lightGrid: { channels: header.channelCount, frames: header.frameCount },
    audioFrames,
    audioChannelsPerFrame,
    startChannel,
  };
  const merged = mergedDimensions(input);
  logger.debug({ light: input.lightGrid, audioFrames: audioFrames.length, startChannel, merged }, 'merging grids');

  const variableHeader = encodeVariableHeader([
    textRecord(MEDIA_FILE_TAG, MERGED_MEDIA_NAME),
    textRecord(SOURCE_TAG, producer),
  ]);
  const totalBytes = await writeFseqFile(
    outputPath,
    {
      channelCount: merged.channels,
      frameCount: merged.frames,
      stepTimeMs: header.stepTimeMs,
      variableHeader,
    },
    mergeRows(input)
  );

  return {
    totalBytes,
    totalChannels: merged.channels,
    totalFrames: merged.frames,
    light: input.lightGrid,
    audio: { channels: audioChannelsPerFrame, frames: audioFrames.length },
  };
}
