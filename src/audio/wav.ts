import { FseqError } from '../errors.js';
import type { AudioChannels, SampleBuffer } from '../types.js';

const PCM_FORMAT_TAG = 1;
const EXTENSIBLE_FORMAT_TAG = 0xfffe;

export interface WavFormat {
  formatTag: number;
  channels: number;
  sampleRate: number;
  bitsPerSample: number;
  dataOffset: number;
  dataSize: number;
}

export function parseWavFormat(buffer: Buffer): WavFormat {
  if (buffer.length < 12 || buffer.toString('ascii', 0, 4) !== 'RIFF' || buffer.toString('ascii', 8, 12) !== 'WAVE') {
    throw new FseqError('InvalidWavFile', 'not a WAV file (missing RIFF/WAVE header)');
  }

  let offset = 12;
  let fmt: Omit<WavFormat, 'dataOffset' | 'dataSize'> | null = null;
  let dataOffset = -1;
  let dataSize = 0;

  while (offset + 8 <= buffer.length) {
    const id = buffer.toString('ascii', offset, offset + 4);
    const size = buffer.readUInt32LE(offset + 4);
    if (id === 'fmt ' && size >= 16 && offset + 24 <= buffer.length) {
      let formatTag = buffer.readUInt16LE(offset + 8);
      // WAVE_FORMAT_EXTENSIBLE keeps the real format in the first two bytes of the sub-format GUID.
      if (formatTag === EXTENSIBLE_FORMAT_TAG && size >= 40 && offset + 34 <= buffer.length) {
        formatTag = buffer.readUInt16LE(offset + 32);
      }
      fmt = {
        formatTag,
        channels: buffer.readUInt16LE(offset + 10),
        sampleRate: buffer.readUInt32LE(offset + 12),
        bitsPerSample: buffer.readUInt16LE(offset + 22),
      };
    } else if (id === 'data') {
      dataOffset = offset + 8;
      // Streamed writers may leave the size unset; take what is present.
      dataSize = Math.min(size, buffer.length - dataOffset);
      break;
    }
    offset += 8 + size + (size % 2); // chunks are word-aligned
  }

  if (!fmt) throw new FseqError('InvalidWavFile', 'WAV fmt chunk not found');
  if (dataOffset < 0) throw new FseqError('InvalidWavFile', 'WAV data chunk not found');
  if (fmt.formatTag !== PCM_FORMAT_TAG) {
    throw new FseqError(
      'InvalidWavFile',
      `unsupported WAV format ${fmt.formatTag} (only PCM is supported)`,
      String(fmt.formatTag)
    );
  }
  if (fmt.sampleRate === 0) {
    throw new FseqError('InvalidWavFile', 'invalid WAV sample rate: 0 Hz', String(fmt.sampleRate));
  }
  if (fmt.channels === 0) {
    throw new FseqError('InvalidWavFile', 'invalid WAV channel count: 0', String(fmt.channels));
  }
  return { ...fmt, dataOffset, dataSize };
}

function asChannels(count: number): AudioChannels {
  if (count === 1 || count === 2) return count;
  throw new FseqError('UnsupportedChannelCount', `only mono or stereo audio is supported, got ${count} channels`, String(count));
}

/** Read one sample of the given width and scale it to signed 16-bit. */
function sampleReader(bitsPerSample: number): (buffer: Buffer, offset: number) => number {
  switch (bitsPerSample) {
    case 8:
      return (buffer, offset) => (buffer.readUInt8(offset) - 128) * 256;
    case 16:
      return (buffer, offset) => buffer.readInt16LE(offset);
    case 24:
      return (buffer, offset) => buffer.readIntLE(offset, 3) >> 8;
    case 32:
      return (buffer, offset) => buffer.readInt32LE(offset) >> 16;
    default:
      throw new FseqError(
        'UnsupportedSampleWidth',
        `unsupported sample width: ${bitsPerSample} bits (expected 8, 16, 24 or 32)`,
        String(bitsPerSample)
      );
  }
}

export function decodeWav(buffer: Buffer): SampleBuffer {
  const format = parseWavFormat(buffer);
  const channels = asChannels(format.channels);
  const read = sampleReader(format.bitsPerSample);
  const bytesPerSample = format.bitsPerSample / 8;
  const frameBytes = bytesPerSample * channels;
  const frames = Math.floor(format.dataSize / frameBytes);
  const samples = new Int16Array(frames * channels);
  for (let i = 0; i < samples.length; i += 1) {
    samples[i] = read(buffer, format.dataOffset + i * bytesPerSample);
  }
  return { samples, sampleRate: format.sampleRate, channels };
}

/** Wrap interleaved 16-bit samples in a minimal PCM WAV container. */
export function encodeWav(buffer: SampleBuffer): Buffer {
  const dataSize = buffer.samples.length * 2;
  const out = Buffer.alloc(44 + dataSize);
  out.write('RIFF', 0, 'ascii');
  out.writeUInt32LE(36 + dataSize, 4);
  out.write('WAVE', 8, 'ascii');
  out.write('fmt ', 12, 'ascii');
  out.writeUInt32LE(16, 16);
  out.writeUInt16LE(PCM_FORMAT_TAG, 20);
  out.writeUInt16LE(buffer.channels, 22);
  out.writeUInt32LE(buffer.sampleRate, 24);
  out.writeUInt32LE(buffer.sampleRate * buffer.channels * 2, 28);
  out.writeUInt16LE(buffer.channels * 2, 32);
  out.writeUInt16LE(16, 34);
  out.write('data', 36, 'ascii');
  out.writeUInt32LE(dataSize, 40);
  buffer.samples.forEach((sample, i) => out.writeInt16LE(sample, 44 + i * 2));
  return out;
}
