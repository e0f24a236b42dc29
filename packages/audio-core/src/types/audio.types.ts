import type { SUPPORTED_BIT_DEPTHS } from '../constants/limits';

/**
 * Sample Buffer Types
 */

export type BitDepth = (typeof SUPPORTED_BIT_DEPTHS)[number];

/**
 * Decoded audio. `samples` is channel-interleaved and normalized to
 * full scale, so one frame is `channelCount` consecutive values.
 */
export type SampleBuffer = {
  readonly samples: Float64Array;
  readonly sampleRate: number;
  readonly bitDepth: BitDepth;
  readonly channelCount: number;
};
