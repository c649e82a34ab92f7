import { readFile } from 'node:fs/promises';
import path from 'node:path';
import type { SampleBuffer } from '../types.js';
import { assertFfmpegAvailable, resolveFfmpegPath, transcodeToPcmWav } from './ffmpeg.js';
import { decodeWav } from './wav.js';

export interface AudioDecoder {
  readonly name: string;
  decode(inputPath: string): Promise<SampleBuffer>;
}

export class NativeWavDecoder implements AudioDecoder {
  readonly name = 'wav';

  async decode(inputPath: string): Promise<SampleBuffer> {
    return decodeWav(await readFile(inputPath));
  }
}

/** Hands container decoding to ffmpeg and reads back its PCM WAV output. */
export class DelegatedContainerDecoder implements AudioDecoder {
  readonly name = 'ffmpeg';

  constructor(private readonly ffmpegPath?: string) {}

  async decode(inputPath: string): Promise<SampleBuffer> {
    const ffmpegPath = this.ffmpegPath ?? (await resolveFfmpegPath());
    await assertFfmpegAvailable(ffmpegPath);
    return decodeWav(await transcodeToPcmWav(ffmpegPath, inputPath));
  }
}

export function selectDecoder(inputPath: string): AudioDecoder {
  return path.extname(inputPath).toLowerCase() === '.wav' ? new NativeWavDecoder() : new DelegatedContainerDecoder();
}
