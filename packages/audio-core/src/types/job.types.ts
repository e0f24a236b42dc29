/**
 * File Job Types
 */

export type JobStage =
  | 'pending'
  | 'decoding'
  | 'trimming'
  | 'normalizing'
  | 'converting'
  | 'encoding'
  | 'done'
  | 'failed';

export type JobStatus = 'success' | 'skipped' | 'failed';

export type JobOutcome = {
  sourcePath: string;
  destPath: string;
  status: JobStatus;
  detail?: string; // why a job was skipped
  error?: string;
  errorCode?: string;
  failedStage?: JobStage;
  durationMs: number;
};

/**
 * Scheduler Types
 */

export type JobFailure = {
  sourcePath: string;
  error: string;
};

export type BatchReport = {
  totalJobs: number;
  succeeded: number;
  skipped: number;
  failed: number;
  failures: JobFailure[];
  outcomes: JobOutcome[];
  durationMs: number;
};
