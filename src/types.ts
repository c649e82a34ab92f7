export type AudioChannels = 1 | 2;

/** Interleaved signed 16-bit PCM. `samples.length` is a multiple of `channels`. */
export interface SampleBuffer {
  samples: Int16Array;
  sampleRate: number;
  channels: AudioChannels;
}

export interface FseqHeader {
  dataOffset: number;
  minorVersion: number;
  majorVersion: number;
  variableHeaderOffset: number;
  channelCount: number;
  frameCount: number;
  stepTimeMs: number;
  flags: number;
  compressionType: number;
  compressionBlockCount: number;
  sparseRangeCount: number;
  reserved: number;
  uniqueId: bigint;
}

export interface VariableHeaderRecord {
  /** Two ASCII characters, e.g. `mf` or `sp`. */
  code: string;
  value: Uint8Array;
}

export interface FrameGeometry {
  samplesPerFrame: number;
  channels: AudioChannels;
  channelsPerFrame: number;
}

export interface GridDimensions {
  channels: number;
  frames: number;
}

export interface MergeResult {
  totalBytes: number;
  totalChannels: number;
  totalFrames: number;
  light: GridDimensions;
  audio: GridDimensions;
}

export type EncodeMode = 'standalone' | 'merged';

export interface EncodeOptions {
  inputPath: string;
  outputPath: string;
  fps?: number;
  /** Overrides `fps` when set. */
  stepTimeMs?: number;
  sampleRate: number;
  mergePath?: string;
  startChannel: number;
  stereo: boolean;
  producer: string;
  atomic?: boolean;
}

export interface EncodeReport {
  mode: EncodeMode;
  outputPath: string;
  source: {
    sampleRate: number;
    channels: AudioChannels;
    sampleFrames: number;
    durationSec: number;
    decoder: string;
  };
  stepTimeMs: number;
  fps: number;
  sampleRate: number;
  channels: AudioChannels;
  samplesPerFrame: number;
  channelsPerFrame: number;
  frameCount: number;
  totalBytes: number;
  merge?: MergeResult;
  /** Channel-output settings a player needs to route the audio block (1-based start). */
  display: {
    startChannel: number;
    channelCount: number;
  };
  firstFrameHex: string;
}
