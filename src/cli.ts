#!/usr/bin/env node

import { realpathSync } from 'node:fs';
import process from 'node:process';
import { fileURLToPath } from 'node:url';
import { ZodError } from 'zod';
import { loadConfig } from './config.js';
import type { AppConfig } from './config.js';
import { loadEnvironment } from './env.js';
import { AudioDecodeError, FseqError } from './errors.js';
import { logger } from './logger.js';
import { encodeAudioFile } from './pipeline.js';
import type { EncodeOptions, EncodeReport } from './types.js';
import { encodeArgsSchema } from './validation.js';
import type { EncodeArgs } from './validation.js';

export type ParsedArgs = {
  help: boolean;
  input?: string;
  output?: string;
  fps?: string;
  stepTime?: string;
  sampleRate?: string;
  merge?: string;
  startChannel?: string;
  stereo: boolean;
  verbose: boolean;
  config?: string;
};

export const USAGE = `
Encode audio into FSEQ v2 channel data for frame-locked playback

Usage:
  fseq-audio <input> -o <output> [options]

Options:
  -o, --output <path>        Output .fseq file (required)
  --fps <n>                  Frame rate in fps (default from config: 40)
  --step-time <ms>           Step time in ms (overrides --fps)
  --sample-rate <hz>         Output sample rate (default from config: 44100)
  --merge <fseq>             Existing uncompressed FSEQ v2 file to merge the audio into
  --start-channel <n>        Channel offset for merge mode (default from config: 500000)
  --stereo                   Keep stereo instead of mixing to mono
  -v, --verbose              Dump the first frame and the channel output hint
  --config <path>            Config file (default: $FSEQ_AUDIO_CONFIG or ./config.json)
  --help                     Show this message
`;

export function parseArgs(argv: string[]): ParsedArgs {
  const result: ParsedArgs = { help: false, stereo: false, verbose: false };

  for (let index = 0; index < argv.length; index += 1) {
    const raw = argv[index];
    if (!raw.startsWith('-')) {
      if (result.input !== undefined) {
        throw new Error(`unexpected argument: ${raw}`);
      }
      result.input = raw;
      continue;
    }
    const eq = raw.indexOf('=');
    const flag = eq >= 0 ? raw.slice(0, eq) : raw;
    const inlineValue = eq >= 0 ? raw.slice(eq + 1) : undefined;

    const getValue = (): string => {
      if (inlineValue !== undefined) return inlineValue;
      const next = argv[index + 1];
      if (next === undefined || next.startsWith('-')) {
        throw new Error(`option ${flag} requires a value`);
      }
      index += 1;
      return next;
    };

    switch (flag) {
      case '-h':
      case '--help':
        result.help = true;
        break;
      case '-o':
      case '--output':
        result.output = getValue();
        break;
      case '--fps':
        result.fps = getValue();
        break;
      case '--step-time':
        result.stepTime = getValue();
        break;
      case '--sample-rate':
        result.sampleRate = getValue();
        break;
      case '--merge':
        result.merge = getValue();
        break;
      case '--start-channel':
        result.startChannel = getValue();
        break;
      case '--stereo':
        result.stereo = true;
        break;
      case '-v':
      case '--verbose':
        result.verbose = true;
        break;
      case '--config':
        result.config = getValue();
        break;
      default:
        throw new Error(`unknown option: ${flag}`);
    }
  }

  return result;
}

const toNumber = (value: string | undefined, fallback: number): number =>
  value === undefined ? fallback : Number(value);

export function resolveArgs(parsed: ParsedArgs, config: AppConfig): EncodeArgs {
  return encodeArgsSchema.parse({
    input: parsed.input ?? '',
    output: parsed.output ?? '',
    fps: toNumber(parsed.fps, config.encoder.fps),
    stepTimeMs: parsed.stepTime === undefined ? undefined : Number(parsed.stepTime),
    sampleRate: toNumber(parsed.sampleRate, config.encoder.sampleRate),
    merge: parsed.merge,
    startChannel: toNumber(parsed.startChannel, config.encoder.startChannel),
    stereo: parsed.stereo,
    verbose: parsed.verbose,
  });
}

export function toEncodeOptions(args: EncodeArgs, config: AppConfig): EncodeOptions {
  return {
    inputPath: args.input,
    outputPath: args.output,
    fps: args.fps,
    stepTimeMs: args.stepTimeMs,
    sampleRate: args.sampleRate,
    mergePath: args.merge,
    startChannel: args.startChannel,
    stereo: args.stereo,
    producer: config.encoder.producer,
    atomic: config.output.atomic,
  };
}

export function logReport(report: EncodeReport, verbose: boolean): void {
  logger.info(
    {
      mode: report.mode,
      output: report.outputPath,
      bytes: report.totalBytes,
      sizeMb: Number((report.totalBytes / 1024 / 1024).toFixed(1)),
      fps: report.fps,
      stepTimeMs: report.stepTimeMs,
      samplesPerFrame: report.samplesPerFrame,
      channelsPerFrame: report.channelsPerFrame,
      frames: report.frameCount,
      durationSec: (report.frameCount * report.stepTimeMs) / 1000,
    },
    `wrote ${report.mode} FSEQ`
  );
  if (report.merge) {
    logger.info(
      {
        light: report.merge.light,
        audio: report.merge.audio,
        channels: report.merge.totalChannels,
        frames: report.merge.totalFrames,
      },
      'merged grid'
    );
  }
  logger.info({ display: report.display }, 'channel output: route this block to the audio renderer');
  if (verbose) {
    logger.info(`first frame (${Math.min(32, report.channelsPerFrame)} bytes): ${report.firstFrameHex}`);
  }
}

export function describeFailure(error: unknown): { code: string; message: string; detail?: string } {
  if (error instanceof FseqError) {
    return { code: error.code, message: error.message, detail: error.detail };
  }
  if (error instanceof AudioDecodeError) {
    return { code: 'AudioDecodeError', message: error.message, detail: error.stderr };
  }
  if (error instanceof ZodError) {
    return {
      code: 'InvalidArguments',
      message: error.issues.map((issue) => `${issue.path.join('.') || 'args'}: ${issue.message}`).join('; '),
    };
  }
  return { code: 'Error', message: error instanceof Error ? error.message : String(error) };
}

export async function main(argv: string[]): Promise<number> {
  loadEnvironment();
  try {
    const parsed = parseArgs(argv);
    if (parsed.help) {
      console.log(USAGE);
      return 0;
    }
    const config = await loadConfig(parsed.config);
    const args = resolveArgs(parsed, config);
    const options = toEncodeOptions(args, config);
    logger.info(
      {
        input: options.inputPath,
        output: options.outputPath,
        sampleRate: options.sampleRate,
        mode: options.mergePath ? 'merged' : 'standalone',
      },
      'encoding audio to FSEQ'
    );
    const report = await encodeAudioFile(options);
    logReport(report, args.verbose);
    return 0;
  } catch (error) {
    const failure = describeFailure(error);
    logger.error(failure, failure.message);
    return 1;
  }
}

const entry = process.argv[1];
if (entry && realpathSync(entry) === fileURLToPath(import.meta.url)) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      logger.fatal({ err: error }, 'unexpected failure');
      process.exitCode = 1;
    });
}
