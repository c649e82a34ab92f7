import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { EventEmitter } from 'node:events';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { tmpdir } from 'node:os';
import { DelegatedContainerDecoder, NativeWavDecoder, selectDecoder } from './decoder.js';
import { encodeWav } from './wav.js';

type FakeRun = { stdout?: Buffer; stderr?: string; code?: number; error?: Error };

// Each spawn call consumes the next scripted run.
function mockSpawn(runs: FakeRun[]) {
  const spawn = vi.fn((_cmd: string, _args: string[]) => {
    const run = runs.shift() ?? { code: 0 };
    const proc = Object.assign(new EventEmitter(), { stdout: new EventEmitter(), stderr: new EventEmitter() });
    setImmediate(() => {
      if (run.error) {
        proc.emit('error', run.error);
        return;
      }
      if (run.stdout) proc.stdout.emit('data', run.stdout);
      if (run.stderr) proc.stderr.emit('data', Buffer.from(run.stderr));
      proc.emit('close', run.code ?? 0);
    });
    return proc;
  });
  vi.doMock('node:child_process', () => ({ spawn }));
  return spawn;
}

describe('selectDecoder', () => {
  it('uses the native decoder for .wav regardless of case', () => {
    expect(selectDecoder('/music/song.WAV')).toBeInstanceOf(NativeWavDecoder);
    expect(selectDecoder('/music/song.mp3')).toBeInstanceOf(DelegatedContainerDecoder);
    expect(selectDecoder('/music/song')).toBeInstanceOf(DelegatedContainerDecoder);
  });
});

describe('NativeWavDecoder', () => {
  let tempDir: string | null = null;

  afterEach(async () => {
    if (tempDir) {
      await rm(tempDir, { recursive: true, force: true });
      tempDir = null;
    }
  });

  it('reads samples from disk', async () => {
    tempDir = await mkdtemp(path.join(tmpdir(), 'fseq-wav-'));
    const wavPath = path.join(tempDir, 'tone.wav');
    await writeFile(wavPath, encodeWav({ samples: Int16Array.from([5, -5]), sampleRate: 16000, channels: 1 }));

    const decoded = await new NativeWavDecoder().decode(wavPath);
    expect([...decoded.samples]).toEqual([5, -5]);
    expect(decoded.sampleRate).toBe(16000);
  });
});

describe('DelegatedContainerDecoder', () => {
  beforeEach(() => {
    vi.resetModules();
  });

  afterEach(() => {
    vi.clearAllMocks();
    vi.doUnmock('node:child_process');
    vi.doUnmock('@ffmpeg-installer/ffmpeg');
    vi.unstubAllEnvs();
    vi.resetModules();
  });

  it('checks ffmpeg then decodes its WAV output', async () => {
    const wav = encodeWav({ samples: Int16Array.from([1, 2, 3, 4]), sampleRate: 48000, channels: 2 });
    const spawn = mockSpawn([{ code: 0 }, { stdout: wav, code: 0 }]);

    const { DelegatedContainerDecoder: Decoder } = await import('./decoder.js');
    const decoded = await new Decoder('/bin/ffmpeg').decode('/music/song.mp3');

    expect(decoded.sampleRate).toBe(48000);
    expect(decoded.channels).toBe(2);
    expect([...decoded.samples]).toEqual([1, 2, 3, 4]);
    expect(spawn.mock.calls[0]?.[1]).toEqual(['-version']);
    expect(spawn.mock.calls[1]?.[1]).toEqual([
      '-nostdin',
      '-hide_banner',
      '-v',
      'error',
      '-i',
      '/music/song.mp3',
      '-vn',
      '-sn',
      '-dn',
      '-af',
      'aformat=sample_fmts=s16:channel_layouts=mono|stereo',
      '-c:a',
      'pcm_s16le',
      '-f',
      'wav',
      'pipe:1',
    ]);
  });

  it('fails with MissingDecoderDependency when ffmpeg cannot be spawned', async () => {
    mockSpawn([{ error: Object.assign(new Error('spawn ffmpeg ENOENT'), { code: 'ENOENT' }) }]);

    const { DelegatedContainerDecoder: Decoder } = await import('./decoder.js');
    await expect(new Decoder('/missing/ffmpeg').decode('/music/song.mp3')).rejects.toMatchObject({
      code: 'MissingDecoderDependency',
      detail: '/missing/ffmpeg',
    });
  });

  it('surfaces ffmpeg stderr when decoding fails', async () => {
    mockSpawn([{ code: 0 }, { code: 1, stderr: 'Invalid data found when processing input\n' }]);

    const { DelegatedContainerDecoder: Decoder } = await import('./decoder.js');
    await expect(new Decoder('/bin/ffmpeg').decode('/music/broken.mp3')).rejects.toMatchObject({
      name: 'AudioDecodeError',
      message: 'audio decode failed (ffmpeg exited with code 1)',
      stderr: 'Invalid data found when processing input',
    });
  });

  it('prefers FFMPEG_PATH over the bundled binary', async () => {
    vi.stubEnv('FFMPEG_PATH', '/opt/ffmpeg/bin/ffmpeg');
    const { resolveFfmpegPath } = await import('./ffmpeg.js');
    await expect(resolveFfmpegPath()).resolves.toBe('/opt/ffmpeg/bin/ffmpeg');
  });

  it('falls back to the @ffmpeg-installer binary', async () => {
    vi.stubEnv('FFMPEG_PATH', '');
    vi.doMock('@ffmpeg-installer/ffmpeg', () => ({
      default: { path: '/bin/ffmpeg' },
      path: '/bin/ffmpeg',
    }));
    const { resolveFfmpegPath } = await import('./ffmpeg.js');
    await expect(resolveFfmpegPath()).resolves.toBe('/bin/ffmpeg');
  });
});
