import { JobError, type JobErrorOptions } from './base.error';

export class NotImplementedError extends JobError {
  constructor(message: string, options?: JobErrorOptions) {
    super(message, options, 'NOT_IMPLEMENTED');
  }
}
