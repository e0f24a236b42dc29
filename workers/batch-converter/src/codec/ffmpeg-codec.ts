import { z } from 'zod';
import {
  DecodeError,
  EncodeError,
  FLAC_MAX_BIT_DEPTH,
  createLogger,
  toErrorMessage,
  type BitDepth,
  type Logger,
  type SampleBuffer
} from '@audio-batch/core';
import { createSampleBuffer } from '../audio/sample-buffer';
import type { AudioCodec } from './codec.interface';
import { encodeWav } from './wav-format';
import { failureMessage, runProcess } from './process-runner';

export type FfmpegEncodeFormat = 'flac' | 'mp3';

export type FfmpegCodecOptions = {
  encodeFormat?: FfmpegEncodeFormat;
  ffmpegPath?: string;
  ffprobePath?: string;
  mp3BitrateKbps?: number;
  logger?: Logger;
};

// ffprobe reports some numeric fields as strings, or as "N/A"
const optionalCount = z
  .union([z.number(), z.string()])
  .optional()
  .transform(value => {
    const n = Number(value);
    return Number.isInteger(n) && n >= 0 ? n : undefined;
  });

const probeSchema = z.object({
  streams: z.array(z.object({
    sample_rate: z.coerce.number().int().positive(),
    channels: z.number().int().positive(),
    sample_fmt: z.string().optional(),
    bits_per_sample: optionalCount,
    bits_per_raw_sample: optionalCount
  })).min(1)
});

type ProbedStream = z.infer<typeof probeSchema>['streams'][number];

const BYTES_PER_F64 = 8;

/**
 * Codec backed by the ffmpeg/ffprobe binaries.
 *
 * Decodes anything ffmpeg can read to 64-bit float PCM on stdout. Encodes
 * by piping an in-memory WAV through ffmpeg with an explicit codec and
 * sample format.
 */
export class FfmpegCodec implements AudioCodec {
  readonly name = 'ffmpeg';
  private readonly ffmpegPath: string;
  private readonly ffprobePath: string;
  private readonly logger: Logger;

  constructor(private readonly options: FfmpegCodecOptions = {}) {
    this.ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
    this.ffprobePath = options.ffprobePath ?? 'ffprobe';
    this.logger = (options.logger ?? createLogger('ffmpeg-codec')).child({ codec: this.name });
  }

  async decode(path: string): Promise<SampleBuffer> {
    const stream = await this.probe(path);

    const args = [
      '-v', 'error',
      '-i', path,
      '-map', '0:a:0',
      '-ac', String(stream.channels),
      '-ar', String(stream.sample_rate),
      '-c:a', 'pcm_f64le',
      '-f', 'f64le',
      'pipe:1'
    ];

    const result = await this.exec(this.ffmpegPath, args, path, DecodeError);
    const failure = failureMessage(result, 'ffmpeg decode');
    if (failure) {
      throw new DecodeError(`${path}: ${failure}`, { path });
    }

    const count = Math.floor(result.stdout.length / BYTES_PER_F64);
    const samples = new Float64Array(count - (count % stream.channels));
    for (let i = 0; i < samples.length; i++) {
      samples[i] = result.stdout.readDoubleLE(i * BYTES_PER_F64);
    }

    this.logger.debug({ path, sampleRate: stream.sample_rate, channels: stream.channels }, 'Decoded with ffmpeg');

    return createSampleBuffer(samples, stream.sample_rate, sourceBitDepth(stream), stream.channels);
  }

  async encode(buffer: SampleBuffer, path: string): Promise<void> {
    const format = this.options.encodeFormat;
    if (!format) {
      throw new EncodeError('This ffmpeg codec instance is decode-only', { path });
    }
    if (format === 'flac' && buffer.bitDepth > FLAC_MAX_BIT_DEPTH) {
      throw new EncodeError(`FLAC supports at most ${FLAC_MAX_BIT_DEPTH}-bit, got ${buffer.bitDepth}-bit audio`, {
        path,
        bitDepth: buffer.bitDepth
      });
    }

    const args = [
      '-v', 'error',
      '-f', 'wav',
      '-i', 'pipe:0',
      ...codecArgs(format, buffer.bitDepth, this.options.mp3BitrateKbps ?? 320),
      '-f', format,
      '-y',
      path
    ];

    const result = await this.exec(this.ffmpegPath, args, path, EncodeError, encodeWav(buffer));
    const failure = failureMessage(result, `ffmpeg ${format} encode`);
    if (failure) {
      throw new EncodeError(`${path}: ${failure}`, { path, format });
    }
  }

  private async probe(path: string): Promise<ProbedStream> {
    const args = [
      '-v', 'error',
      '-select_streams', 'a:0',
      '-show_entries', 'stream=sample_rate,channels,sample_fmt,bits_per_sample,bits_per_raw_sample',
      '-of', 'json',
      path
    ];

    const result = await this.exec(this.ffprobePath, args, path, DecodeError);
    const failure = failureMessage(result, 'ffprobe');
    if (failure) {
      throw new DecodeError(`${path}: ${failure}`, { path });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(result.stdout.toString('utf8'));
    } catch (error) {
      throw new DecodeError(`${path}: unreadable ffprobe output: ${toErrorMessage(error)}`, { path });
    }

    const parsed = probeSchema.safeParse(raw);
    if (!parsed.success) {
      throw new DecodeError(`${path}: no decodable audio stream`, { path });
    }

    return parsed.data.streams[0];
  }

  private async exec(
    cmd: string,
    args: string[],
    path: string,
    ErrorType: typeof DecodeError | typeof EncodeError,
    input?: Buffer
  ) {
    try {
      return await runProcess(cmd, args, { input, logger: this.logger });
    } catch (error) {
      throw new ErrorType(`${cmd} could not run for ${path}: ${toErrorMessage(error)}`, { path, cmd });
    }
  }
}

function sourceBitDepth(stream: ProbedStream): BitDepth {
  if (stream.sample_fmt?.startsWith('flt') || stream.sample_fmt?.startsWith('dbl')) return 32;

  const bits = stream.bits_per_raw_sample || stream.bits_per_sample || 0;
  if (bits === 24) return 24;
  if (bits >= 32) return 32;
  return 16;
}

function codecArgs(format: FfmpegEncodeFormat, bitDepth: BitDepth, mp3BitrateKbps: number): string[] {
  switch (format) {
    case 'flac':
      return bitDepth === 16
        ? ['-c:a', 'flac', '-sample_fmt', 's16']
        : ['-c:a', 'flac', '-sample_fmt', 's32', '-bits_per_raw_sample', '24'];
    case 'mp3':
      return ['-c:a', 'libmp3lame', '-b:a', `${mp3BitrateKbps}k`];
  }
}
