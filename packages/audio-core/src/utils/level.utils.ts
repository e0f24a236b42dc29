import type { BitDepth } from '../types/audio.types';

/**
 * Convert decibels to a linear amplitude ratio
 */
export function dbToLinear(db: number): number {
  return Math.pow(10, db / 20);
}

/**
 * Convert a linear amplitude to dBFS (-Infinity for silence)
 */
export function linearToDb(amplitude: number): number {
  return amplitude > 0 ? 20 * Math.log10(amplitude) : -Infinity;
}

/**
 * Number of quantization steps per unit of full scale for a bit depth
 */
export function quantizationScale(bitDepth: BitDepth): number {
  return Math.pow(2, bitDepth - 1);
}

/**
 * Largest positive normalized value a bit depth can represent
 */
export function fullScaleMax(bitDepth: BitDepth): number {
  const scale = quantizationScale(bitDepth);
  return (scale - 1) / scale;
}

/**
 * Clamp a normalized sample into the range representable at a bit depth
 */
export function clampSample(value: number, bitDepth: BitDepth): number {
  const max = fullScaleMax(bitDepth);
  if (value > max) return max;
  if (value < -1) return -1;
  return value;
}
