import path from 'node:path';
import { selectDecoder } from './audio/decoder.js';
import type { AudioDecoder } from './audio/decoder.js';
import { durationSec, resampleLinear, toMono } from './audio/sampleTransform.js';
import { MEDIA_FILE_TAG, SOURCE_TAG } from './fseq/constants.js';
import { encodeFrames, frameGeometry, stepTimeFromFps } from './fseq/frameEncoder.js';
import { encodeVariableHeader, textRecord } from './fseq/headerCodec.js';
import { mergeIntoFseq } from './fseq/merger.js';
import { writeAtomically, writeStandalone } from './fseq/writer.js';
import { logger } from './logger.js';
import type { EncodeOptions, EncodeReport, MergeResult } from './types.js';

const HEX_DUMP_BYTES = 32;

export const hexDump = (bytes: Uint8Array, limit = HEX_DUMP_BYTES): string =>
  Array.from(bytes.subarray(0, limit), (b) => b.toString(16).padStart(2, '0')).join(' ');

export function resolveStepTime(options: Pick<EncodeOptions, 'fps' | 'stepTimeMs'>): number {
  if (options.stepTimeMs !== undefined) return options.stepTimeMs;
  return stepTimeFromFps(options.fps ?? 0);
}

export async function encodeAudioFile(
  options: EncodeOptions,
  decoder: AudioDecoder = selectDecoder(options.inputPath)
): Promise<EncodeReport> {
  const stepTimeMs = resolveStepTime(options);
  const source = await decoder.decode(options.inputPath);
  const sourceFrames = source.samples.length / source.channels;
  logger.info(
    {
      decoder: decoder.name,
      sampleRate: source.sampleRate,
      channels: source.channels,
      samples: sourceFrames,
      durationSec: Number(durationSec(source).toFixed(2)),
    },
    'audio decoded'
  );

  let audio = source;
  if (!options.stereo || audio.channels === 1) {
    audio = toMono(audio);
  }
  if (audio.sampleRate !== options.sampleRate) {
    logger.info({ from: audio.sampleRate, to: options.sampleRate }, 'resampling');
    audio = resampleLinear(audio, options.sampleRate);
  }

  const geometry = frameGeometry(options.sampleRate, stepTimeMs, audio.channels);
  const frames = encodeFrames(audio, geometry.samplesPerFrame);
  logger.info({ ...geometry, frames: frames.length, stepTimeMs }, 'frames encoded');

  const write = <T>(run: (target: string) => Promise<T>) =>
    options.atomic ? writeAtomically(options.outputPath, run) : run(options.outputPath);

  let totalBytes: number;
  let merge: MergeResult | undefined;
  if (options.mergePath) {
    const mergePath = options.mergePath;
    merge = await write((target) =>
      mergeIntoFseq({
        audioFrames: frames,
        audioChannelsPerFrame: geometry.channelsPerFrame,
        existingPath: mergePath,
        outputPath: target,
        startChannel: options.startChannel,
        producer: options.producer,
      })
    );
    totalBytes = merge.totalBytes;
  } else {
    const variableHeader = encodeVariableHeader([
      textRecord(MEDIA_FILE_TAG, path.basename(options.inputPath)),
      textRecord(SOURCE_TAG, options.producer),
    ]);
    totalBytes = await write((target) =>
      writeStandalone(target, frames, geometry.channelsPerFrame, stepTimeMs, variableHeader)
    );
  }

  return {
    mode: merge ? 'merged' : 'standalone',
    outputPath: options.outputPath,
    source: {
      sampleRate: source.sampleRate,
      channels: source.channels,
      sampleFrames: sourceFrames,
      durationSec: durationSec(source),
      decoder: decoder.name,
    },
    stepTimeMs,
    fps: 1000 / stepTimeMs,
    sampleRate: options.sampleRate,
    channels: audio.channels,
    samplesPerFrame: geometry.samplesPerFrame,
    channelsPerFrame: geometry.channelsPerFrame,
    frameCount: frames.length,
    totalBytes,
    merge,
    display: {
      startChannel: merge ? options.startChannel + 1 : 1,
      channelCount: geometry.channelsPerFrame,
    },
    firstFrameHex: frames.length > 0 ? hexDump(frames[0]) : '',
  };
}
