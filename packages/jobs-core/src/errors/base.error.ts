export type JobErrorCode =
  | 'JOB_ERROR'
  | 'SCHEMA_NOT_DEFINED'
  | 'INVALID_ARGS'
  | 'SERIALIZATION_ERROR'
  | 'NOT_IMPLEMENTED'
  | 'CONFIG_ERROR';

export type JobErrorOptions = {
  jobName?: string;
  cause?: unknown;
  context?: Record<string, unknown>;
};

/**
 * Base error for every failure raised by the job pipelines.
 * Also thrown directly when a work body fails with a foreign error.
 */
export class JobError extends Error {
  readonly code: JobErrorCode;
  readonly jobName?: string;
  readonly context?: Record<string, unknown>;

  constructor(message: string, options: JobErrorOptions = {}, code: JobErrorCode = 'JOB_ERROR') {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.jobName = options.jobName;
    this.context = options.context;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      jobName: this.jobName,
      context: this.context
    };
  }
}

export function isJobError(value: unknown): value is JobError {
  return value instanceof JobError;
}
