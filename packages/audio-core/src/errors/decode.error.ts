import { BaseError } from './base.error';

/**
 * Decode error - unsupported or corrupt input audio
 */
export class DecodeError extends BaseError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'DECODE_ERROR', context);
  }
}
