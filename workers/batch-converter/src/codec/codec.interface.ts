import type { SampleBuffer } from '@audio-batch/core';

/**
 * Decode/encode capability for one or more container formats
 */
export interface AudioCodec {
  /**
   * Short identifier used in logs (e.g. "wav", "ffmpeg")
   */
  readonly name: string;

  /**
   * Read and decode an audio file
   * @throws DecodeError if the file is unreadable, corrupt or unsupported
   */
  decode(path: string): Promise<SampleBuffer>;

  /**
   * Encode a buffer and write it to `path`, replacing any existing file
   * @throws EncodeError if the buffer cannot be encoded or written
   */
  encode(buffer: SampleBuffer, path: string): Promise<void>;
}
