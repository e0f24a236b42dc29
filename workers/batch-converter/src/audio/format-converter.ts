import {
  SUPPORTED_BIT_DEPTHS,
  TransformError,
  quantizationScale,
  type BitDepth,
  type SampleBuffer
} from '@audio-batch/core';
import { createSampleBuffer, frameCount } from './sample-buffer';

/**
 * Resample, then requantize. Each step is a no-op when the buffer
 * already matches its target.
 */
export function convertFormat(buffer: SampleBuffer, targetRate: number, targetDepth: BitDepth): SampleBuffer {
  return requantize(resample(buffer, targetRate), targetDepth);
}

/**
 * Linear-interpolation resampler, per channel
 */
export function resample(buffer: SampleBuffer, targetRate: number): SampleBuffer {
  if (!Number.isInteger(targetRate) || targetRate <= 0) {
    throw new TransformError(`Invalid target sample rate: ${targetRate}`, { targetRate });
  }

  if (buffer.sampleRate === targetRate) {
    return buffer;
  }

  const { channelCount } = buffer;
  const inFrames = frameCount(buffer);
  const outFrames = Math.round((inFrames * targetRate) / buffer.sampleRate);
  const step = buffer.sampleRate / targetRate;
  const out = new Float64Array(outFrames * channelCount);

  for (let frame = 0; frame < outFrames; frame++) {
    const position = frame * step;
    const i0 = Math.min(Math.floor(position), inFrames - 1);
    const i1 = Math.min(i0 + 1, inFrames - 1);
    const frac = position - i0;

    for (let ch = 0; ch < channelCount; ch++) {
      const s0 = buffer.samples[i0 * channelCount + ch];
      const s1 = buffer.samples[i1 * channelCount + ch];
      out[frame * channelCount + ch] = s0 + (s1 - s0) * frac;
    }
  }

  return createSampleBuffer(out, targetRate, buffer.bitDepth, channelCount);
}

/**
 * Round every sample onto the grid of `targetDepth`
 */
export function requantize(buffer: SampleBuffer, targetDepth: BitDepth): SampleBuffer {
  if (!SUPPORTED_BIT_DEPTHS.includes(targetDepth)) {
    throw new TransformError(`Unsupported target bit depth: ${targetDepth}`, { targetDepth });
  }

  if (buffer.bitDepth === targetDepth) {
    return buffer;
  }

  const scale = quantizationScale(targetDepth);
  const out = new Float64Array(buffer.samples.length);

  for (let i = 0; i < out.length; i++) {
    const step = Math.round(buffer.samples[i] * scale);
    out[i] = Math.min(Math.max(step, -scale), scale - 1) / scale;
  }

  return createSampleBuffer(out, buffer.sampleRate, targetDepth, buffer.channelCount);
}
