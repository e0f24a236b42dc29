// Re-export all schemas and types
export * from './processing-config.schema';
