import { describe, it, expect } from 'vitest';
import { TransformError, fullScaleMax } from '@audio-batch/core';
import { measureIntegratedLoudness } from '../src/audio/loudness-meter';
import { normalizeLoudness } from '../src/audio/loudness-normalizer';
import { concat, peak, silence, sine } from './helpers/signals';

function measured(buffer: Parameters<typeof measureIntegratedLoudness>[0]): number {
  const value = measureIntegratedLoudness(buffer);
  if (value === null) {
    throw new Error('expected defined loudness');
  }
  return value;
}

describe('measureIntegratedLoudness', () => {
  it('should read a full-scale 997 Hz sine at about -3 LUFS', () => {
    const buffer = sine({ frequency: 997, amplitude: 1, seconds: 5 });

    expect(Math.abs(measured(buffer) - -3.01)).toBeLessThan(0.2);
  });

  it('should add 3 dB when the same signal is on two channels', () => {
    const mono = sine({ amplitude: 0.25, seconds: 2 });
    const stereo = sine({ amplitude: 0.25, seconds: 2, channelCount: 2 });

    expect(measured(stereo) - measured(mono)).toBeCloseTo(10 * Math.log10(2), 6);
  });

  it('should gate out quiet passages', () => {
    const loud = sine({ amplitude: 0.5, seconds: 2 });
    const mixed = concat(loud, sine({ amplitude: 0.005, seconds: 2 }));

    expect(Math.abs(measured(mixed) - measured(loud))).toBeLessThan(0.5);
  });

  it('should be undefined for silence', () => {
    expect(measureIntegratedLoudness(silence(2))).toBeNull();
  });

  it('should be undefined for a buffer shorter than one block', () => {
    expect(measureIntegratedLoudness(sine({ seconds: 0.2 }))).toBeNull();
  });
});

describe('normalizeLoudness', () => {
  it('should bring loudness to the target', () => {
    const buffer = sine({ amplitude: 0.1, seconds: 3 });

    const result = normalizeLoudness(buffer, -20);

    expect(Math.abs(measured(result.buffer) - -20)).toBeLessThan(0.1);
  });

  it('should report the applied gain', () => {
    const buffer = sine({ amplitude: 0.1, seconds: 2 });
    const before = measured(buffer);

    const result = normalizeLoudness(buffer, -12);

    expect(result.measuredLUFS).toBe(before);
    expect(result.gainDb).toBeCloseTo(-12 - before, 10);
  });

  it('should pass silence through unchanged', () => {
    const buffer = silence(1);

    const result = normalizeLoudness(buffer, -12);

    expect(result.buffer).toBe(buffer);
    expect(result.measuredLUFS).toBeNull();
    expect(result.gainDb).toBe(0);
  });

  it('should hard-clamp samples to the bit depth range', () => {
    const buffer = sine({ amplitude: 0.5, seconds: 2, bitDepth: 16 });

    const { buffer: normalized } = normalizeLoudness(buffer, 0);
    const { max, min } = peak(normalized);

    expect(max).toBe(fullScaleMax(16));
    expect(min).toBe(-1);
  });

  it('should not mutate the input buffer', () => {
    const buffer = sine({ amplitude: 0.1, seconds: 1 });
    const copy = Float64Array.from(buffer.samples);

    normalizeLoudness(buffer, -6);

    expect(buffer.samples).toEqual(copy);
  });

  it('should reject a non-finite target', () => {
    expect(() => normalizeLoudness(sine({ seconds: 1 }), Number.POSITIVE_INFINITY)).toThrow(TransformError);
  });
});
