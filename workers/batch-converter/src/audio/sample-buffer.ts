import { TransformError, type BitDepth, type SampleBuffer } from '@audio-batch/core';

/**
 * Build a sample buffer, enforcing the frame and rate invariants
 */
export function createSampleBuffer(
  samples: Float64Array,
  sampleRate: number,
  bitDepth: BitDepth,
  channelCount: number
): SampleBuffer {
  if (!Number.isInteger(channelCount) || channelCount <= 0) {
    throw new TransformError(`Invalid channel count: ${channelCount}`, { channelCount });
  }

  if (!Number.isInteger(sampleRate) || sampleRate <= 0) {
    throw new TransformError(`Invalid sample rate: ${sampleRate}`, { sampleRate });
  }

  if (samples.length % channelCount !== 0) {
    throw new TransformError(
      `Sample count ${samples.length} is not a multiple of channel count ${channelCount}`,
      { sampleCount: samples.length, channelCount }
    );
  }

  return { samples, sampleRate, bitDepth, channelCount };
}

/**
 * Number of frames (one sample per channel) in a buffer
 */
export function frameCount(buffer: SampleBuffer): number {
  return buffer.samples.length / buffer.channelCount;
}

export function durationSec(buffer: SampleBuffer): number {
  return frameCount(buffer) / buffer.sampleRate;
}

/**
 * Copy of a buffer with new samples and the same metadata
 */
export function withSamples(buffer: SampleBuffer, samples: Float64Array): SampleBuffer {
  return createSampleBuffer(samples, buffer.sampleRate, buffer.bitDepth, buffer.channelCount);
}
