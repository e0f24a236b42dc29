export * from './level.utils';
