import { promises as fs } from 'fs';
import * as path from 'path';
import {
  BaseError,
  DecodeError,
  EncodeError,
  PARTIAL_FILE_SUFFIX,
  TransformError,
  canTransition,
  createLogger,
  toErrorMessage,
  type JobOutcome,
  type JobStage,
  type JobStatus,
  type Logger,
  type ProcessingConfig,
  type SampleBuffer
} from '@audio-batch/core';
import type { CodecRegistry } from '../codec/codec-registry';
import { convertFormat } from '../audio/format-converter';
import { normalizeLoudness } from '../audio/loudness-normalizer';
import { frameCount } from '../audio/sample-buffer';
import { trimSilence } from '../audio/silence-trimmer';

// Distinguishes temp files of jobs sharing a destination directory
let partialSequence = 0;

export type FileJobDeps = {
  codecs: CodecRegistry;
  logger?: Logger;
};

/**
 * One input file's trip through decode, trim, normalize, convert and encode.
 *
 * `run()` never throws: every failure becomes a `failed` outcome, and the
 * destination is either fully written or not created.
 */
export class FileJob {
  private stage: JobStage = 'pending';
  private readonly codecs: CodecRegistry;
  private readonly logger: Logger;

  constructor(
    readonly sourcePath: string,
    readonly destPath: string,
    readonly config: ProcessingConfig,
    deps: FileJobDeps
  ) {
    this.codecs = deps.codecs;
    this.logger = (deps.logger ?? createLogger('file-job')).child({ sourcePath });
  }

  get currentStage(): JobStage {
    return this.stage;
  }

  async run(): Promise<JobOutcome> {
    const startTime = Date.now();
    const partialPath = `${this.destPath}.${process.pid}-${++partialSequence}${PARTIAL_FILE_SUFFIX}`;

    this.logger.debug({ destPath: this.destPath }, 'Job started');

    try {
      if (this.config.skipExisting && (await pathExists(this.destPath))) {
        this.advance('done');
        return this.finish('skipped', startTime, 'destination already exists');
      }

      const encoder = this.codecs.getEncoder(this.destPath);
      if (!encoder) {
        throw new EncodeError(`Unsupported output format: ${path.extname(this.destPath) || '(none)'}`, {
          destPath: this.destPath
        });
      }

      // 1. Decode
      this.advance('decoding');
      const decoder = this.codecs.getDecoder(this.sourcePath);
      if (!decoder) {
        throw new DecodeError(`Unsupported input format: ${path.extname(this.sourcePath) || '(none)'}`, {
          sourcePath: this.sourcePath
        });
      }
      let buffer: SampleBuffer = await decoder.decode(this.sourcePath);

      this.logger.debug({
        codec: decoder.name,
        sampleRate: buffer.sampleRate,
        bitDepth: buffer.bitDepth,
        channelCount: buffer.channelCount,
        frames: frameCount(buffer)
      }, 'Decoded');

      // 2. Trim
      if (this.config.trimSilence) {
        this.advance('trimming');
        const before = frameCount(buffer);
        buffer = trimSilence(buffer, this.config.silenceThreshDb);

        this.logger.debug({ removedFrames: before - frameCount(buffer) }, 'Silence trimmed');

        if (frameCount(buffer) === 0) {
          this.advance('done');
          return this.finish('skipped', startTime, `source is silent below -${this.config.silenceThreshDb} dBFS`);
        }
      }

      // 3. Normalize
      if (this.config.normalize) {
        this.advance('normalizing');
        const result = normalizeLoudness(buffer, this.config.targetLUFS);
        buffer = result.buffer;

        if (result.measuredLUFS === null) {
          this.logger.debug('Loudness undefined, normalization skipped');
        } else {
          this.logger.debug({ measuredLUFS: result.measuredLUFS, gainDb: result.gainDb }, 'Loudness normalized');
        }
      }

      // 4. Convert
      this.advance('converting');
      buffer = convertFormat(
        buffer,
        this.config.targetSampleRate ?? buffer.sampleRate,
        this.config.targetBitDepth ?? buffer.bitDepth
      );

      // 5. Encode, then move into place
      this.advance('encoding');
      await fs.mkdir(path.dirname(this.destPath), { recursive: true });
      await encoder.encode(buffer, partialPath);
      await fs.rename(partialPath, this.destPath);

      this.advance('done');
      return this.finish('success', startTime);
    } catch (error) {
      const failedStage = this.stage;
      const wrapped = wrapStageError(error, failedStage);
      this.stage = 'failed';

      await this.removePartial(partialPath);

      this.logger.error({
        stage: failedStage,
        code: wrapped.code,
        error: wrapped.message
      }, 'Job failed');

      return {
        sourcePath: this.sourcePath,
        destPath: this.destPath,
        status: 'failed',
        error: wrapped.message,
        errorCode: wrapped.code,
        failedStage,
        durationMs: Date.now() - startTime
      };
    }
  }

  private advance(next: JobStage): void {
    if (!canTransition(this.stage, next)) {
      throw new TransformError(`Invalid job stage transition: ${this.stage} -> ${next}`);
    }
    this.logger.trace({ from: this.stage, to: next }, 'Stage transition');
    this.stage = next;
  }

  private finish(status: Exclude<JobStatus, 'failed'>, startTime: number, detail?: string): JobOutcome {
    const durationMs = Date.now() - startTime;

    if (status === 'skipped') {
      this.logger.info({ detail, durationMs }, 'Job skipped');
    } else {
      this.logger.info({ destPath: this.destPath, durationMs }, 'Job completed');
    }

    return {
      sourcePath: this.sourcePath,
      destPath: this.destPath,
      status,
      ...(detail ? { detail } : {}),
      durationMs
    };
  }

  private async removePartial(partialPath: string): Promise<void> {
    try {
      await fs.rm(partialPath, { force: true });
    } catch (error) {
      this.logger.warn({ partialPath, error: toErrorMessage(error) }, 'Failed to remove partial output');
    }
  }
}

/**
 * Keep taxonomy errors as they are; attribute anything else to the stage
 */
function wrapStageError(error: unknown, stage: JobStage): BaseError {
  if (error instanceof BaseError) {
    return error;
  }

  const message = toErrorMessage(error);
  switch (stage) {
    case 'decoding':
      return new DecodeError(message);
    case 'encoding':
      return new EncodeError(message);
    default:
      return new TransformError(message);
  }
}

async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}
