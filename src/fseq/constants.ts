export const FSEQ_MAGIC = 'PSEQ';
export const FIXED_HEADER_BYTES = 32;
export const FSEQ_MAJOR_VERSION = 2;
export const FSEQ_MINOR_VERSION = 0;
export const DATA_ALIGNMENT = 4;
export const MAX_DATA_OFFSET = 0xffff;
export const MAX_STEP_TIME_MS = 0xff;

export const SYNC_MARKER: readonly [number, number] = [0xaa, 0x55];
export const SYNC_MARKER_BYTES = SYNC_MARKER.length;
export const BYTES_PER_SAMPLE = 2; // 16-bit PCM

export const MEDIA_FILE_TAG = 'mf';
export const SOURCE_TAG = 'sp';
export const MERGED_MEDIA_NAME = 'merged';

export const DEFAULT_SAMPLE_RATE = 44100;
export const DEFAULT_FPS = 40;
export const DEFAULT_START_CHANNEL = 500_000;
