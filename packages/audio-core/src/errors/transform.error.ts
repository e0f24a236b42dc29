import { BaseError } from './base.error';

/**
 * Transform error - invalid parameters for a sample buffer operation
 */
export class TransformError extends BaseError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'TRANSFORM_ERROR', context);
  }
}
