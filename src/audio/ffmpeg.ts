import { spawn } from 'node:child_process';
import { AudioDecodeError, FseqError } from '../errors.js';
import { logger } from '../logger.js';

const BASE_ARGS = ['-nostdin', '-hide_banner', '-v', 'error'];

export async function resolveFfmpegPath(): Promise<string> {
  const override = process.env.FFMPEG_PATH;
  if (override) return override;
  try {
    const installer = await import('@ffmpeg-installer/ffmpeg');
    return installer.default.path;
  } catch (err) {
    throw new FseqError(
      'MissingDecoderDependency',
      'ffmpeg is required to decode non-WAV input; install @ffmpeg-installer/ffmpeg for this platform or set FFMPEG_PATH',
      err instanceof Error ? err.message : String(err)
    );
  }
}

export async function assertFfmpegAvailable(ffmpegPath: string): Promise<void> {
  const code = await new Promise<number>((resolve, reject) => {
    const proc = spawn(ffmpegPath, ['-version'], { stdio: ['ignore', 'ignore', 'ignore'] });
    proc.once('error', (err) => reject(err));
    proc.once('close', (exitCode) => resolve(exitCode ?? -1));
  }).catch((err) => {
    throw new FseqError(
      'MissingDecoderDependency',
      `ffmpeg not available at ${ffmpegPath}: ${err instanceof Error ? err.message : String(err)}`,
      ffmpegPath
    );
  });

  if (code !== 0) {
    throw new FseqError('MissingDecoderDependency', `ffmpeg not available: exited with code ${code}`, ffmpegPath);
  }
}

/**
 * Decode any container ffmpeg understands into a 16-bit PCM WAV held in memory.
 * The source rate is kept; layouts wider than stereo are folded down to stereo.
 */
export async function transcodeToPcmWav(ffmpegPath: string, inputPath: string): Promise<Buffer> {
  const args = [
    ...BASE_ARGS,
    '-i',
    inputPath,
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
  ];
  logger.debug({ ffmpegPath, args }, 'spawning ffmpeg decoder');

  const chunks: Buffer[] = [];
  let stderrBuf = '';
  const code = await new Promise<number>((resolve, reject) => {
    const proc = spawn(ffmpegPath, args, { stdio: ['ignore', 'pipe', 'pipe'] });
    proc.stdout.on('data', (chunk: Buffer) => chunks.push(chunk));
    proc.stderr.on('data', (chunk: Buffer) => {
      stderrBuf += chunk.toString();
    });
    proc.once('error', (err) => reject(err));
    proc.once('close', (exitCode) => resolve(exitCode ?? -1));
  }).catch((err) => {
    throw new AudioDecodeError('audio decode failed', err instanceof Error ? err.message : String(err));
  });

  if (code !== 0) {
    throw new AudioDecodeError(`audio decode failed (ffmpeg exited with code ${code})`, stderrBuf.trim());
  }
  return Buffer.concat(chunks);
}
