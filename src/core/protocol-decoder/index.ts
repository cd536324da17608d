export { decodeCapture, decodeFrame, extractBits } from './decoder';
export { computeChecksum, bitsToFrame, convertDht22, convertDht11, isInRange } from './helpers';
export type { DecoderConfig, Measurement, Bit } from './types';
