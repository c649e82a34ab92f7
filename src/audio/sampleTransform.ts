import type { SampleBuffer } from '../types.js';

const INT16_MIN = -32768;
const INT16_MAX = 32767;

/** Mix interleaved channels down to one by the truncated mean of each sample frame. */
export function toMono(buffer: SampleBuffer): SampleBuffer {
  if (buffer.channels === 1) return buffer;
  const { samples, channels } = buffer;
  const frames = Math.floor(samples.length / channels);
  const mono = new Int16Array(frames);
  for (let frame = 0; frame < frames; frame += 1) {
    let sum = 0;
    for (let ch = 0; ch < channels; ch += 1) {
      sum += samples[frame * channels + ch];
    }
    mono[frame] = Math.trunc(sum / channels);
  }
  return { samples: mono, sampleRate: buffer.sampleRate, channels: 1 };
}

/**
 * Linear-interpolation resampler. Not band-limited; output keeps the source
 * duration (`floor(frames × dst / src)` sample frames) and stays in int16 range.
 */
export function resampleLinear(buffer: SampleBuffer, dstRate: number): SampleBuffer {
  const srcRate = buffer.sampleRate;
  if (srcRate === dstRate) return buffer;
  if (!Number.isInteger(dstRate) || dstRate <= 0) {
    throw new RangeError(`target sample rate must be a positive integer, got ${dstRate}`);
  }

  const { samples, channels } = buffer;
  const frames = Math.floor(samples.length / channels);
  const outFrames = Math.floor((frames * dstRate) / srcRate);
  const ratio = srcRate / dstRate;
  const out = new Int16Array(outFrames * channels);

  for (let ch = 0; ch < channels; ch += 1) {
    for (let i = 0; i < outFrames; i += 1) {
      const pos = i * ratio;
      const idx = Math.floor(pos);
      const frac = pos - idx;
      let value: number;
      if (idx + 1 < frames) {
        value = samples[idx * channels + ch] * (1 - frac) + samples[(idx + 1) * channels + ch] * frac;
      } else {
        value = samples[Math.min(idx, frames - 1) * channels + ch];
      }
      out[i * channels + ch] = Math.trunc(Math.max(INT16_MIN, Math.min(INT16_MAX, value)));
    }
  }

  return { samples: out, sampleRate: dstRate, channels };
}

export const durationSec = (buffer: SampleBuffer): number =>
  buffer.samples.length / buffer.channels / buffer.sampleRate;
