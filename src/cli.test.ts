import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { tmpdir } from 'node:os';
import { ZodError } from 'zod';
import { describeFailure, logReport, main, parseArgs, resolveArgs, toEncodeOptions } from './cli.js';
import { configSchema, reloadConfig } from './config.js';
import { encodeWav } from './audio/wav.js';
import { FseqError } from './errors.js';
import { decodeFixedHeader } from './fseq/headerCodec.js';
import { logger } from './logger.js';
import type { EncodeReport } from './types.js';

const defaults = configSchema.parse({});

describe('parseArgs', () => {
  it('reads the positional input and every option', () => {
    const parsed = parseArgs([
      'song.wav',
      '-o',
      'out.fseq',
      '--fps',
      '30',
      '--step-time=20',
      '--sample-rate',
      '22050',
      '--merge',
      'lights.fseq',
      '--start-channel',
      '1024',
      '--stereo',
      '-v',
    ]);
    expect(parsed).toEqual({
      help: false,
      input: 'song.wav',
      output: 'out.fseq',
      fps: '30',
      stepTime: '20',
      sampleRate: '22050',
      merge: 'lights.fseq',
      startChannel: '1024',
      stereo: true,
      verbose: true,
    });
  });

  it('rejects unknown options and missing values', () => {
    expect(() => parseArgs(['song.wav', '--loud'])).toThrow('unknown option: --loud');
    expect(() => parseArgs(['song.wav', '-o'])).toThrow('option -o requires a value');
    expect(() => parseArgs(['a.wav', 'b.wav'])).toThrow('unexpected argument: b.wav');
  });
});

describe('resolveArgs', () => {
  it('takes defaults from the config', () => {
    const args = resolveArgs(parseArgs(['song.wav', '-o', 'out.fseq']), defaults);
    expect(args).toEqual({
      input: 'song.wav',
      output: 'out.fseq',
      fps: 40,
      stepTimeMs: undefined,
      sampleRate: 44100,
      merge: undefined,
      startChannel: 500000,
      stereo: false,
      verbose: false,
    });
    expect(toEncodeOptions(args, defaults)).toMatchObject({
      inputPath: 'song.wav',
      outputPath: 'out.fseq',
      producer: 'fseq-audio encoder',
      atomic: true,
    });
  });

  it('fails validation for a missing output or a non-numeric value', () => {
    expect(() => resolveArgs(parseArgs(['song.wav']), defaults)).toThrow(ZodError);
    expect(() => resolveArgs(parseArgs(['song.wav', '-o', 'x.fseq', '--fps', 'fast']), defaults)).toThrow(ZodError);
  });

  it('rejects frame rates whose step time does not fit a byte', () => {
    expect(() => resolveArgs(parseArgs(['song.wav', '-o', 'x.fseq', '--fps', '3']), defaults)).toThrow(
      /step time above 255 ms/
    );
  });
});

describe('describeFailure', () => {
  it('names the error code and offending value', () => {
    expect(describeFailure(new FseqError('UnsupportedVersion', 'only FSEQ v2 is supported, got v1.0', '1.0'))).toEqual({
      code: 'UnsupportedVersion',
      message: 'only FSEQ v2 is supported, got v1.0',
      detail: '1.0',
    });
    expect(describeFailure(new Error('boom'))).toEqual({ code: 'Error', message: 'boom' });
  });
});

describe('logReport', () => {
  const report: EncodeReport = {
    mode: 'standalone',
    outputPath: 'out.fseq',
    source: { sampleRate: 8000, channels: 1, sampleFrames: 800, durationSec: 0.1, decoder: 'wav' },
    stepTimeMs: 50,
    fps: 20,
    sampleRate: 8000,
    channels: 1,
    samplesPerFrame: 400,
    channelsPerFrame: 802,
    frameCount: 2,
    totalBytes: 1672,
    display: { startChannel: 1, channelCount: 802 },
    firstFrameHex: 'aa 55',
  };

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const loggedMessages = (verbose: boolean) => {
    const info = vi.spyOn(logger, 'info').mockImplementation(() => undefined);
    logReport(report, verbose);
    return info.mock.calls.map((call) => String(call.at(-1)));
  };

  it('always logs the channel output block', () => {
    expect(loggedMessages(false)).toEqual([
      'wrote standalone FSEQ',
      'channel output: route this block to the audio renderer',
    ]);
  });

  it('adds the first frame bytes when verbose', () => {
    expect(loggedMessages(true)).toEqual([
      'wrote standalone FSEQ',
      'channel output: route this block to the audio renderer',
      'first frame (32 bytes): aa 55',
    ]);
  });
});

describe('main', () => {
  let tempDir: string;

  beforeEach(async () => {
    reloadConfig();
    tempDir = await mkdtemp(path.join(tmpdir(), 'fseq-cli-'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    reloadConfig();
    await rm(tempDir, { recursive: true, force: true });
  });

  it('prints usage for --help', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    expect(await main(['--help'])).toBe(0);
    expect(log).toHaveBeenCalledTimes(1);
  });

  it('encodes a WAV file end to end', async () => {
    const input = path.join(tempDir, 'beep.wav');
    const output = path.join(tempDir, 'beep.fseq');
    const configPath = path.join(tempDir, 'config.json');
    await writeFile(configPath, JSON.stringify({ encoder: { sampleRate: 8000 }, output: { atomic: false } }), 'utf-8');
    await writeFile(input, encodeWav({ samples: new Int16Array(800), sampleRate: 8000, channels: 1 }));

    expect(await main([input, '-o', output, '--config', configPath, '--fps', '20'])).toBe(0);

    const header = decodeFixedHeader(await readFile(output));
    // 8000 Hz × 50 ms = 400 samples per frame
    expect(header).toMatchObject({ channelCount: 802, frameCount: 2, stepTimeMs: 50 });
  });

  it('returns a failing status instead of throwing', async () => {
    const configPath = path.join(tempDir, 'config.json');
    await writeFile(configPath, '{}', 'utf-8');
    expect(await main([path.join(tempDir, 'absent.wav'), '-o', path.join(tempDir, 'x.fseq'), '--config', configPath])).toBe(1);
  });
});
