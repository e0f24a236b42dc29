import { WaveFile } from 'wavefile';
import { z } from 'zod';
import {
  DecodeError,
  EncodeError,
  quantizationScale,
  toErrorMessage,
  type BitDepth,
  type SampleBuffer
} from '@audio-batch/core';
import { createSampleBuffer, frameCount } from '../audio/sample-buffer';

// Fields of a parsed WaveFile the decoder relies on
const waveHeaderSchema = z.object({
  bitDepth: z.string(),
  fmt: z.object({
    numChannels: z.number().int().positive(),
    sampleRate: z.number().int().positive()
  })
});

type SampleLayout = {
  bitDepth: BitDepth;
  offset: number;
  scale: number;
};

/**
 * Parse a RIFF/WAVE file held in memory into normalized samples
 * @throws DecodeError for unreadable files and non-PCM encodings
 */
export function decodeWav(data: Buffer): SampleBuffer {
  let wave: WaveFile;
  try {
    wave = new WaveFile(data);
  } catch (error) {
    throw new DecodeError('Not a readable WAV file', { reason: toErrorMessage(error) });
  }

  const header = waveHeaderSchema.safeParse(wave);
  if (!header.success) {
    throw new DecodeError('Not a readable WAV file', { reason: 'missing format fields' });
  }

  const { bitDepth, fmt } = header.data;
  const layout = sampleLayout(bitDepth);

  const raw: unknown = wave.getSamples(true, Float64Array);
  if (!(raw instanceof Float64Array)) {
    throw new DecodeError(`Unexpected sample layout for ${bitDepth}-bit WAV`, { bitDepth });
  }

  const usable = raw.length - (raw.length % fmt.numChannels);
  const samples = new Float64Array(usable);
  for (let i = 0; i < usable; i++) {
    samples[i] = (raw[i] - layout.offset) / layout.scale;
  }

  return createSampleBuffer(samples, fmt.sampleRate, layout.bitDepth, fmt.numChannels);
}

/**
 * How raw WaveFile sample values map onto [-1, 1)
 */
function sampleLayout(code: string): SampleLayout {
  if (code === '32f' || code === '64') {
    return { bitDepth: 32, offset: 0, scale: 1 };
  }

  if (code === '8') {
    return { bitDepth: 16, offset: 128, scale: 128 };
  }

  const bits = /^\d+$/.test(code) ? Number(code) : NaN;
  if (bits > 8 && bits <= 32) {
    return {
      bitDepth: bits <= 16 ? 16 : bits <= 24 ? 24 : 32,
      offset: 0,
      scale: Math.pow(2, bits - 1)
    };
  }

  throw new DecodeError(`Unsupported WAV encoding: ${code}`, { bitDepth: code });
}

/**
 * Serialize a buffer as integer PCM at its own bit depth
 */
export function encodeWav(buffer: SampleBuffer): Buffer {
  const scale = quantizationScale(buffer.bitDepth);
  const values = new Float64Array(buffer.samples.length);

  for (let i = 0; i < values.length; i++) {
    values[i] = Math.min(Math.max(Math.round(buffer.samples[i] * scale), -scale), scale - 1);
  }

  try {
    const wave = new WaveFile();
    wave.fromScratch(buffer.channelCount, buffer.sampleRate, String(buffer.bitDepth), values);
    return Buffer.from(wave.toBuffer());
  } catch (error) {
    throw new EncodeError(`Cannot build WAV data: ${toErrorMessage(error)}`, {
      frames: frameCount(buffer),
      bitDepth: buffer.bitDepth
    });
  }
}
