import { BaseError } from './base.error';

/**
 * Encode error - unsupported output format or a failed write
 */
export class EncodeError extends BaseError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'ENCODE_ERROR', context);
  }
}
