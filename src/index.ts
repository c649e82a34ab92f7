export * from './types.js';
export * from './errors.js';
export { toMono, resampleLinear, durationSec } from './audio/sampleTransform.js';
export { decodeWav, encodeWav, parseWavFormat } from './audio/wav.js';
export { NativeWavDecoder, DelegatedContainerDecoder, selectDecoder } from './audio/decoder.js';
export type { AudioDecoder } from './audio/decoder.js';
export * from './fseq/constants.js';
export * from './fseq/headerCodec.js';
export * from './fseq/frameEncoder.js';
export { writeStandalone, writeFseqFile, writeAtomically } from './fseq/writer.js';
export type { FseqLayout } from './fseq/writer.js';
export { readHeader, readChannelData, readVariableHeader } from './fseq/reader.js';
export { mergeIntoFseq, mergeRow, mergeRows, mergedDimensions } from './fseq/merger.js';
export type { MergeInput } from './fseq/merger.js';
export { encodeAudioFile, hexDump, resolveStepTime } from './pipeline.js';
