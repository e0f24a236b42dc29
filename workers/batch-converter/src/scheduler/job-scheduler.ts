import {
  createLogger,
  toErrorMessage,
  type BatchReport,
  type JobOutcome,
  type Logger
} from '@audio-batch/core';

/**
 * Anything the scheduler can run. `run()` is expected to resolve with an
 * outcome; a rejection is recorded as a failure of that job.
 */
export interface SchedulableJob {
  readonly sourcePath: string;
  readonly destPath: string;
  run(): Promise<JobOutcome>;
}

export type OutcomeListener = (outcome: JobOutcome, completed: number, total: number) => void;

/**
 * Runs file jobs sequentially or over a bounded pool of concurrent runners
 */
export class JobScheduler {
  private readonly logger: Logger;
  private jobsInFlight = 0;

  constructor(logger?: Logger) {
    this.logger = (logger ?? createLogger('job-scheduler')).child({ component: 'job-scheduler' });
  }

  /**
   * Run every job to a terminal state and aggregate the outcomes.
   *
   * With `workerCount <= 1` jobs run one after another in input order.
   * Otherwise up to `workerCount` runners pull from a shared cursor and
   * outcomes are collected in completion order.
   */
  async run(jobs: readonly SchedulableJob[], workerCount: number, onOutcome?: OutcomeListener): Promise<BatchReport> {
    const startTime = Date.now();
    const outcomes: JobOutcome[] = [];

    const record = (outcome: JobOutcome): void => {
      outcomes.push(outcome);
      onOutcome?.(outcome, outcomes.length, jobs.length);
    };

    const poolSize = Math.max(1, Math.min(Math.floor(workerCount) || 1, jobs.length));

    this.logger.info({ totalJobs: jobs.length, workerCount: poolSize }, 'Scheduler starting');

    if (poolSize <= 1) {
      for (const job of jobs) {
        record(await this.execute(job));
      }
    } else {
      let cursor = 0;

      const runner = async (): Promise<void> => {
        while (cursor < jobs.length) {
          const job = jobs[cursor++];
          record(await this.execute(job));
        }
      };

      await Promise.all(Array.from({ length: poolSize }, () => runner()));
    }

    const report = buildReport(outcomes, Date.now() - startTime);

    this.logger.info({
      totalJobs: report.totalJobs,
      succeeded: report.succeeded,
      skipped: report.skipped,
      failed: report.failed,
      durationMs: report.durationMs
    }, 'Scheduler finished');

    return report;
  }

  private async execute(job: SchedulableJob): Promise<JobOutcome> {
    const startTime = Date.now();
    this.jobsInFlight++;

    try {
      return await job.run();
    } catch (error) {
      const errorMessage = toErrorMessage(error);

      this.logger.error({ sourcePath: job.sourcePath, error: errorMessage }, 'Job processing error');

      return {
        sourcePath: job.sourcePath,
        destPath: job.destPath,
        status: 'failed',
        error: errorMessage,
        durationMs: Date.now() - startTime
      };
    } finally {
      this.jobsInFlight--;
    }
  }

  get inFlight(): number {
    return this.jobsInFlight;
  }
}

export function buildReport(outcomes: JobOutcome[], durationMs: number): BatchReport {
  const failures = outcomes
    .filter(outcome => outcome.status === 'failed')
    .map(outcome => ({ sourcePath: outcome.sourcePath, error: outcome.error ?? 'Unknown error' }));

  return {
    totalJobs: outcomes.length,
    succeeded: outcomes.filter(outcome => outcome.status === 'success').length,
    skipped: outcomes.filter(outcome => outcome.status === 'skipped').length,
    failed: failures.length,
    failures,
    outcomes,
    durationMs
  };
}
