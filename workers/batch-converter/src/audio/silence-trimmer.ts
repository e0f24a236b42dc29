import { TransformError, dbToLinear, type SampleBuffer } from '@audio-batch/core';
import { frameCount, withSamples } from './sample-buffer';

/**
 * Remove leading and trailing silence.
 *
 * A frame is silent when its peak across channels is below `-thresholdDb`
 * dBFS. A buffer that is silent throughout comes back with zero frames.
 */
export function trimSilence(buffer: SampleBuffer, thresholdDb: number): SampleBuffer {
  if (!Number.isFinite(thresholdDb) || thresholdDb < 0) {
    throw new TransformError(`Invalid silence threshold: ${thresholdDb} dB`, { thresholdDb });
  }

  const threshold = dbToLinear(-thresholdDb);
  const frames = frameCount(buffer);

  let start = 0;
  while (start < frames && framePeak(buffer, start) < threshold) {
    start++;
  }

  if (start === frames) {
    return withSamples(buffer, new Float64Array(0));
  }

  let end = frames;
  while (end > start && framePeak(buffer, end - 1) < threshold) {
    end--;
  }

  if (start === 0 && end === frames) {
    return buffer;
  }

  const { channelCount } = buffer;
  return withSamples(buffer, buffer.samples.slice(start * channelCount, end * channelCount));
}

function framePeak(buffer: SampleBuffer, frame: number): number {
  const offset = frame * buffer.channelCount;
  let peak = 0;

  for (let ch = 0; ch < buffer.channelCount; ch++) {
    const magnitude = Math.abs(buffer.samples[offset + ch]);
    if (magnitude > peak) peak = magnitude;
  }

  return peak;
}
