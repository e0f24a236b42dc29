import type { JobStage } from '../types/job.types';

/**
 * Valid file job stage transitions
 */
export const JOB_STAGE_TRANSITIONS: Record<JobStage, JobStage[]> = {
  pending: ['decoding', 'done', 'failed'], // done: skipped before decoding
  decoding: ['trimming', 'normalizing', 'converting', 'failed'],
  trimming: ['normalizing', 'converting', 'done', 'failed'], // done: fully silent
  normalizing: ['converting', 'failed'],
  converting: ['encoding', 'failed'],
  encoding: ['done', 'failed'],
  done: [],
  failed: []
};

export function canTransition(from: JobStage, to: JobStage): boolean {
  return JOB_STAGE_TRANSITIONS[from].includes(to);
}
