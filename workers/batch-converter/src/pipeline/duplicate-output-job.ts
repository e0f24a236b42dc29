import { EncodeError, type JobOutcome } from '@audio-batch/core';
import type { SchedulableJob } from '../scheduler/job-scheduler';

/**
 * Stand-in for a source whose destination another source already owns.
 * Resolves as failed without touching the disk.
 */
export class DuplicateOutputJob implements SchedulableJob {
  constructor(
    readonly sourcePath: string,
    readonly destPath: string,
    readonly claimedBy: string
  ) {}

  async run(): Promise<JobOutcome> {
    const error = new EncodeError(`Output path ${this.destPath} is already used by ${this.claimedBy}`, {
      destPath: this.destPath,
      claimedBy: this.claimedBy
    });

    return {
      sourcePath: this.sourcePath,
      destPath: this.destPath,
      status: 'failed',
      error: error.message,
      errorCode: error.code,
      failedStage: 'pending',
      durationMs: 0
    };
  }
}
