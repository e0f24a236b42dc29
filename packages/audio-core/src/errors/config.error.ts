import type { ZodIssue } from 'zod';
import { BaseError } from './base.error';

/**
 * Config error - invalid processing configuration, fatal for the whole run
 */
export class ConfigError extends BaseError {
  readonly issues: ZodIssue[];

  constructor(message: string, issues: ZodIssue[] = [], context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', context);
    this.issues = issues;
  }
}
