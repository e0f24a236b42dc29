import {
  LOUDNESS_ABSOLUTE_GATE_LUFS,
  LOUDNESS_BLOCK_OVERLAP,
  LOUDNESS_BLOCK_SEC,
  LOUDNESS_RELATIVE_GATE_LU,
  type SampleBuffer
} from '@audio-batch/core';
import { frameCount } from './sample-buffer';

type Biquad = {
  b0: number;
  b1: number;
  b2: number;
  a1: number;
  a2: number;
};

// BS.1770 channel weights: L, R, C at unity, surrounds at +1.5 dB
const SURROUND_WEIGHT = 1.41;

/**
 * Integrated loudness (ITU-R BS.1770-4) in LUFS.
 *
 * Returns null when loudness is undefined: the buffer is shorter than one
 * gating block, or no block rises above the absolute gate.
 */
export function measureIntegratedLoudness(buffer: SampleBuffer): number | null {
  const frames = frameCount(buffer);
  const blockSize = Math.round(LOUDNESS_BLOCK_SEC * buffer.sampleRate);
  const hopSize = Math.round(blockSize * (1 - LOUDNESS_BLOCK_OVERLAP));

  if (blockSize === 0 || frames < blockSize) {
    return null;
  }

  const weighted = kWeight(buffer);
  const blockCount = Math.floor((frames - blockSize) / hopSize) + 1;

  // Mean square per block and channel
  const powers: Float64Array[] = [];
  for (let block = 0; block < blockCount; block++) {
    const startFrame = block * hopSize;
    const perChannel = new Float64Array(buffer.channelCount);

    for (let ch = 0; ch < buffer.channelCount; ch++) {
      const channel = weighted[ch];
      let sum = 0;
      for (let i = startFrame; i < startFrame + blockSize; i++) {
        sum += channel[i] * channel[i];
      }
      perChannel[ch] = sum / blockSize;
    }

    powers.push(perChannel);
  }

  const weights = channelWeights(buffer.channelCount);
  const blockLoudness = powers.map(perChannel => loudnessOf(perChannel, weights));

  const aboveAbsolute = powers.filter((_, i) => blockLoudness[i] > LOUDNESS_ABSOLUTE_GATE_LUFS);
  if (aboveAbsolute.length === 0) {
    return null;
  }

  const relativeGate = loudnessOf(meanPower(aboveAbsolute, buffer.channelCount), weights) + LOUDNESS_RELATIVE_GATE_LU;

  const gated = powers.filter((_, i) =>
    blockLoudness[i] > LOUDNESS_ABSOLUTE_GATE_LUFS && blockLoudness[i] > relativeGate
  );
  if (gated.length === 0) {
    return null;
  }

  return loudnessOf(meanPower(gated, buffer.channelCount), weights);
}

function loudnessOf(perChannel: Float64Array, weights: number[]): number {
  let sum = 0;
  for (let ch = 0; ch < perChannel.length; ch++) {
    sum += weights[ch] * perChannel[ch];
  }
  return sum > 0 ? -0.691 + 10 * Math.log10(sum) : -Infinity;
}

function meanPower(blocks: Float64Array[], channelCount: number): Float64Array {
  const mean = new Float64Array(channelCount);
  for (const block of blocks) {
    for (let ch = 0; ch < channelCount; ch++) {
      mean[ch] += block[ch];
    }
  }
  for (let ch = 0; ch < channelCount; ch++) {
    mean[ch] /= blocks.length;
  }
  return mean;
}

function channelWeights(channelCount: number): number[] {
  return Array.from({ length: channelCount }, (_, ch) => (ch < 3 ? 1.0 : SURROUND_WEIGHT));
}

/**
 * Apply the K-weighting pre-filter, returning one planar array per channel
 */
function kWeight(buffer: SampleBuffer): Float64Array[] {
  const stages = [
    highShelf(buffer.sampleRate, 1500.0, 4.0, 1 / Math.sqrt(2)),
    highPass(buffer.sampleRate, 38.0, 0.5)
  ];
  const frames = frameCount(buffer);
  const channels: Float64Array[] = [];

  for (let ch = 0; ch < buffer.channelCount; ch++) {
    let signal: Float64Array = new Float64Array(frames);
    for (let i = 0; i < frames; i++) {
      signal[i] = buffer.samples[i * buffer.channelCount + ch];
    }
    for (const stage of stages) {
      signal = applyBiquad(signal, stage);
    }
    channels.push(signal);
  }

  return channels;
}

function applyBiquad(input: Float64Array, f: Biquad): Float64Array {
  const output = new Float64Array(input.length);
  let x1 = 0;
  let x2 = 0;
  let y1 = 0;
  let y2 = 0;

  for (let i = 0; i < input.length; i++) {
    const x0 = input[i];
    const y0 = f.b0 * x0 + f.b1 * x1 + f.b2 * x2 - f.a1 * y1 - f.a2 * y2;
    output[i] = y0;
    x2 = x1;
    x1 = x0;
    y2 = y1;
    y1 = y0;
  }

  return output;
}

function highShelf(sampleRate: number, fc: number, gainDb: number, q: number): Biquad {
  const a = Math.pow(10, gainDb / 40);
  const w0 = (2 * Math.PI * fc) / sampleRate;
  const cos = Math.cos(w0);
  const alpha = Math.sin(w0) / (2 * q);
  const sqrtA = Math.sqrt(a);

  const a0 = a + 1 - (a - 1) * cos + 2 * sqrtA * alpha;
  return {
    b0: (a * (a + 1 + (a - 1) * cos + 2 * sqrtA * alpha)) / a0,
    b1: (-2 * a * (a - 1 + (a + 1) * cos)) / a0,
    b2: (a * (a + 1 + (a - 1) * cos - 2 * sqrtA * alpha)) / a0,
    a1: (2 * (a - 1 - (a + 1) * cos)) / a0,
    a2: (a + 1 - (a - 1) * cos - 2 * sqrtA * alpha) / a0
  };
}

function highPass(sampleRate: number, fc: number, q: number): Biquad {
  const w0 = (2 * Math.PI * fc) / sampleRate;
  const cos = Math.cos(w0);
  const alpha = Math.sin(w0) / (2 * q);

  const a0 = 1 + alpha;
  return {
    b0: (1 + cos) / 2 / a0,
    b1: -(1 + cos) / a0,
    b2: (1 + cos) / 2 / a0,
    a1: (-2 * cos) / a0,
    a2: (1 - alpha) / a0
  };
}
