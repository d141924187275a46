import { JobError, type JobErrorOptions } from './base.error';

/**
 * Invalid args error - strict validation failed at submission time
 */
export class InvalidArgsError extends JobError {
  constructor(message: string, options?: JobErrorOptions) {
    super(message, options, 'INVALID_ARGS');
  }
}
