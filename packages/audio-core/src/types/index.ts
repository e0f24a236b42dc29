export * from './audio.types';
export * from './job.types';
