import { JobError, type JobErrorOptions } from './base.error';

/**
 * Schema not defined error - a job declares `args` that is not a zod object schema
 */
export class SchemaNotDefinedError extends JobError {
  constructor(message: string, options?: JobErrorOptions) {
    super(message, options, 'SCHEMA_NOT_DEFINED');
  }
}
