import { promises as fs } from 'fs';
import { BaseError, DecodeError, EncodeError, toErrorMessage, type SampleBuffer } from '@audio-batch/core';
import type { AudioCodec } from './codec.interface';
import { decodeWav, encodeWav } from './wav-format';

/**
 * In-process WAV codec
 */
export class WavCodec implements AudioCodec {
  readonly name = 'wav';

  async decode(path: string): Promise<SampleBuffer> {
    let data: Buffer;
    try {
      data = await fs.readFile(path);
    } catch (error) {
      throw new DecodeError(`Cannot read ${path}: ${toErrorMessage(error)}`, { path });
    }

    try {
      return decodeWav(data);
    } catch (error) {
      if (error instanceof BaseError) {
        throw new DecodeError(`${path}: ${error.message}`, { path, ...error.context });
      }
      throw error;
    }
  }

  async encode(buffer: SampleBuffer, path: string): Promise<void> {
    const data = encodeWav(buffer);

    try {
      await fs.writeFile(path, data);
    } catch (error) {
      throw new EncodeError(`Cannot write ${path}: ${toErrorMessage(error)}`, { path });
    }
  }
}
