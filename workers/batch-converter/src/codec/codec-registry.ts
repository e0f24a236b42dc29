import * as path from 'path';
import { ConfigError, SUPPORTED_INPUT_EXTENSIONS, type Logger } from '@audio-batch/core';
import type { AudioCodec } from './codec.interface';
import { FfmpegCodec } from './ffmpeg-codec';
import { WavCodec } from './wav-codec';

/**
 * Registry of codecs, keyed by lower-case file extension
 */
export class CodecRegistry {
  private readonly decoders = new Map<string, AudioCodec>();
  private readonly encoders = new Map<string, AudioCodec>();

  /**
   * Registry wired with the in-process WAV codec and ffmpeg for the rest
   */
  static createDefault(logger?: Logger): CodecRegistry {
    const registry = new CodecRegistry();
    const wav = new WavCodec();
    const ffmpegDecoder = new FfmpegCodec({ logger });

    for (const ext of SUPPORTED_INPUT_EXTENSIONS) {
      registry.registerDecoder(ext, ext === '.wav' ? wav : ffmpegDecoder);
    }

    registry.registerEncoder('.wav', wav);
    registry.registerEncoder('.flac', new FfmpegCodec({ encodeFormat: 'flac', logger }));
    registry.registerEncoder('.mp3', new FfmpegCodec({ encodeFormat: 'mp3', logger }));

    return registry;
  }

  /**
   * @throws ConfigError if a decoder is already registered for `ext`
   */
  registerDecoder(ext: string, codec: AudioCodec): void {
    this.register(this.decoders, ext, codec, 'decoder');
  }

  /**
   * @throws ConfigError if an encoder is already registered for `ext`
   */
  registerEncoder(ext: string, codec: AudioCodec): void {
    this.register(this.encoders, ext, codec, 'encoder');
  }

  getDecoder(filePath: string): AudioCodec | null {
    return this.decoders.get(extensionOf(filePath)) ?? null;
  }

  getEncoder(filePath: string): AudioCodec | null {
    return this.encoders.get(extensionOf(filePath)) ?? null;
  }

  private register(target: Map<string, AudioCodec>, ext: string, codec: AudioCodec, role: string): void {
    const key = ext.toLowerCase();
    if (target.has(key)) {
      throw new ConfigError(`An ${role} is already registered for ${key}`);
    }
    target.set(key, codec);
  }
}

function extensionOf(filePath: string): string {
  return path.extname(filePath).toLowerCase();
}
