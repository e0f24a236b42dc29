import { describe, it, expect } from 'vitest';
import { TransformError } from '@audio-batch/core';
import { trimSilence } from '../src/audio/silence-trimmer';
import { frameCount } from '../src/audio/sample-buffer';
import { concat, fromFrames, silence, sine } from './helpers/signals';

describe('trimSilence', () => {
  it('should remove frames below -60 dBFS at both ends', () => {
    const buffer = fromFrames([[0], [0.0001], [0.5], [-0.25], [0.00001], [0]]);

    const trimmed = trimSilence(buffer, 60);

    expect(Array.from(trimmed.samples)).toEqual([0.5, -0.25]);
  });

  it('should keep quiet frames between loud ones', () => {
    const buffer = fromFrames([[0], [0.5], [0], [0], [0.5], [0]]);

    const trimmed = trimSilence(buffer, 60);

    expect(Array.from(trimmed.samples)).toEqual([0.5, 0, 0, 0.5]);
  });

  it('should use the loudest channel of each frame', () => {
    const buffer = fromFrames([[0, 0], [0, 0.01], [0.2, 0], [0, 0]]);

    const trimmed = trimSilence(buffer, 60);

    expect(trimmed.channelCount).toBe(2);
    expect(Array.from(trimmed.samples)).toEqual([0, 0.01, 0.2, 0]);
  });

  it('should treat the threshold as a magnitude below full scale', () => {
    const buffer = fromFrames([[0.05], [0.5], [0.05]]);

    expect(Array.from(trimSilence(buffer, 20).samples)).toEqual([0.5]);
    expect(Array.from(trimSilence(buffer, 60).samples)).toEqual([0.05, 0.5, 0.05]);
  });

  it('should return an empty buffer for fully silent input', () => {
    const buffer = silence(0.5, 44100, 2);

    const trimmed = trimSilence(buffer, 60);

    expect(frameCount(trimmed)).toBe(0);
    expect(trimmed.sampleRate).toBe(44100);
    expect(trimmed.channelCount).toBe(2);
    expect(trimmed.bitDepth).toBe(16);
  });

  it('should return the same buffer when nothing is silent', () => {
    const buffer = fromFrames([[0.3], [-0.3]]);

    expect(trimSilence(buffer, 60)).toBe(buffer);
  });

  it('should never lengthen a buffer', () => {
    const buffer = concat(
      silence(0.1, 8000),
      sine({ sampleRate: 8000, amplitude: 0.01, seconds: 0.2, bitDepth: 16, phase: Math.PI / 2 }),
      silence(0.1, 8000)
    );

    for (const threshold of [0, 20, 40, 60, 96]) {
      const trimmed = trimSilence(buffer, threshold);
      expect(frameCount(trimmed)).toBeLessThanOrEqual(frameCount(buffer));
    }
  });

  it('should not change sample rate or bit depth', () => {
    const buffer = concat(silence(0.1, 48000), sine({ seconds: 0.1, bitDepth: 16, phase: Math.PI / 2 }));

    const trimmed = trimSilence(buffer, 60);

    expect(frameCount(trimmed)).toBe(4800);
    expect(trimmed.sampleRate).toBe(48000);
    expect(trimmed.bitDepth).toBe(16);
  });

  it('should reject a negative or non-finite threshold', () => {
    const buffer = fromFrames([[0.5]]);

    expect(() => trimSilence(buffer, -1)).toThrow(TransformError);
    expect(() => trimSilence(buffer, Number.NaN)).toThrow(TransformError);
  });
});
