import { JobError, type JobErrorOptions } from './base.error';

/**
 * Serialization error - arguments could not be written to or read from a wire payload
 */
export class SerializationError extends JobError {
  constructor(message: string, options?: JobErrorOptions) {
    super(message, options, 'SERIALIZATION_ERROR');
  }
}
