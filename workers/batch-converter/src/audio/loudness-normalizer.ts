import { TransformError, clampSample, dbToLinear, type SampleBuffer } from '@audio-batch/core';
import { measureIntegratedLoudness } from './loudness-meter';
import { withSamples } from './sample-buffer';

export type NormalizationResult = {
  buffer: SampleBuffer;
  measuredLUFS: number | null;
  gainDb: number;
};

/**
 * Apply a uniform gain so integrated loudness lands on `targetLUFS`.
 *
 * Silent or too-short buffers have no defined loudness and are returned
 * unchanged. Samples pushed past full scale are hard-clamped to the range
 * of the buffer's bit depth.
 */
export function normalizeLoudness(buffer: SampleBuffer, targetLUFS: number): NormalizationResult {
  if (!Number.isFinite(targetLUFS)) {
    throw new TransformError(`Invalid loudness target: ${targetLUFS} LUFS`, { targetLUFS });
  }

  const measuredLUFS = measureIntegratedLoudness(buffer);

  if (measuredLUFS === null) {
    return { buffer, measuredLUFS, gainDb: 0 };
  }

  const gainDb = targetLUFS - measuredLUFS;
  const gain = dbToLinear(gainDb);
  const samples = new Float64Array(buffer.samples.length);

  for (let i = 0; i < samples.length; i++) {
    samples[i] = clampSample(buffer.samples[i] * gain, buffer.bitDepth);
  }

  return { buffer: withSamples(buffer, samples), measuredLUFS, gainDb };
}
