import { FseqError } from '../errors.js';
import type { AudioChannels, FrameGeometry, SampleBuffer } from '../types.js';
import { BYTES_PER_SAMPLE, MAX_STEP_TIME_MS, SYNC_MARKER, SYNC_MARKER_BYTES } from './constants.js';

export function stepTimeFromFps(fps: number): number {
  if (!Number.isFinite(fps) || fps <= 0) {
    throw new FseqError('InvalidFrameRate', `frame rate must be positive, got ${fps}`, String(fps));
  }
  const stepTimeMs = Math.floor(1000 / fps);
  if (stepTimeMs <= 0) {
    throw new FseqError('InvalidFrameRate', `frame rate ${fps} fps gives a step time below 1 ms`, String(fps));
  }
  return stepTimeMs;
}

export function samplesPerFrame(sampleRate: number, stepTimeMs: number): number {
  if (!Number.isInteger(stepTimeMs) || stepTimeMs <= 0 || stepTimeMs > MAX_STEP_TIME_MS) {
    throw new FseqError(
      'InvalidFrameRate',
      `step time must be an integer between 1 and ${MAX_STEP_TIME_MS} ms, got ${stepTimeMs}`,
      String(stepTimeMs)
    );
  }
  const count = Math.floor((sampleRate * stepTimeMs) / 1000);
  if (!Number.isFinite(count) || count <= 0) {
    throw new FseqError(
      'InvalidFrameRate',
      `${sampleRate} Hz at ${stepTimeMs} ms per frame gives ${count} samples per frame`,
      String(count)
    );
  }
  return count;
}

/** Width of one frame row: sync marker plus two bytes per sample per audio channel. */
export const channelsPerFrame = (perFrame: number, channels: AudioChannels): number =>
  SYNC_MARKER_BYTES + perFrame * BYTES_PER_SAMPLE * channels;

export function frameGeometry(sampleRate: number, stepTimeMs: number, channels: AudioChannels): FrameGeometry {
  const perFrame = samplesPerFrame(sampleRate, stepTimeMs);
  return { samplesPerFrame: perFrame, channels, channelsPerFrame: channelsPerFrame(perFrame, channels) };
}

export function frameCountFor(buffer: SampleBuffer, perFrame: number): number {
  const sampleFrames = buffer.samples.length / buffer.channels;
  return Math.ceil(sampleFrames / perFrame);
}

export function assertFrameSize(frame: Uint8Array, expected: number, index: number): void {
  if (frame.length !== expected) {
    throw new FseqError(
      'FrameSizeMismatch',
      `frame ${index} is ${frame.length} bytes, expected ${expected}`,
      `${frame.length}!=${expected}`
    );
  }
}

/**
 * Serialize one chunk of interleaved samples as `AA 55` followed by each sample
 * high byte first. Slots past the end of `chunk` stay zero (silence).
 */
export function encodeFrame(chunk: Int16Array, width: number): Uint8Array {
  const frame = new Uint8Array(width);
  frame[0] = SYNC_MARKER[0];
  frame[1] = SYNC_MARKER[1];
  for (let i = 0; i < chunk.length; i += 1) {
    const unsigned = chunk[i] & 0xffff;
    const at = SYNC_MARKER_BYTES + i * BYTES_PER_SAMPLE;
    frame[at] = (unsigned >> 8) & 0xff;
    frame[at + 1] = unsigned & 0xff;
  }
  return frame;
}

export function encodeFrames(buffer: SampleBuffer, perFrame: number): Uint8Array[] {
  if (!Number.isInteger(perFrame) || perFrame <= 0) {
    throw new FseqError('InvalidFrameRate', `samples per frame must be positive, got ${perFrame}`, String(perFrame));
  }
  const slotsPerFrame = perFrame * buffer.channels;
  const width = channelsPerFrame(perFrame, buffer.channels);
  const frames: Uint8Array[] = [];
  for (let start = 0; start < buffer.samples.length; start += slotsPerFrame) {
    frames.push(encodeFrame(buffer.samples.subarray(start, start + slotsPerFrame), width));
  }
  return frames;
}

/** Decode the PCM portion of a frame back into signed samples. */
export function decodeFramePcm(frame: Uint8Array): Int16Array {
  const count = Math.floor((frame.length - SYNC_MARKER_BYTES) / BYTES_PER_SAMPLE);
  const out = new Int16Array(count);
  for (let i = 0; i < count; i += 1) {
    const at = SYNC_MARKER_BYTES + i * BYTES_PER_SAMPLE;
    out[i] = (frame[at] << 8) | frame[at + 1];
  }
  return out;
}
