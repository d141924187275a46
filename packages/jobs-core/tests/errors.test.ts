import { describe, it, expect } from 'vitest';
import {
  ConfigError,
  InvalidArgsError,
  isJobError,
  JobError,
  NotImplementedError,
  SchemaNotDefinedError,
  SerializationError
} from '../src';

describe('JobError', () => {
  it('should carry code, job name and cause', () => {
    const cause = new Error('root');
    const error = new JobError('failed', { jobName: 'SomeJob', cause, context: { attempt: 1 } });

    expect(error.name).toBe('JobError');
    expect(error.code).toBe('JOB_ERROR');
    expect(error.jobName).toBe('SomeJob');
    expect(error.cause).toBe(cause);
    expect(error.toJSON()).toEqual({
      name: 'JobError',
      code: 'JOB_ERROR',
      message: 'failed',
      jobName: 'SomeJob',
      context: { attempt: 1 }
    });
  });

  it('should give every subclass its own name and code', () => {
    const errors = [
      new InvalidArgsError('a'),
      new SchemaNotDefinedError('b'),
      new SerializationError('c'),
      new NotImplementedError('d')
    ];

    expect(errors.map((error) => [error.name, error.code])).toEqual([
      ['InvalidArgsError', 'INVALID_ARGS'],
      ['SchemaNotDefinedError', 'SCHEMA_NOT_DEFINED'],
      ['SerializationError', 'SERIALIZATION_ERROR'],
      ['NotImplementedError', 'NOT_IMPLEMENTED']
    ]);
    expect(errors.every((error) => error instanceof JobError)).toBe(true);
  });

  it('should join config issues into one message', () => {
    const error = new ConfigError(['SUPABASE_URL: Required', 'MAX_CONCURRENT_JOBS: Expected number']);

    expect(error.message).toBe('Invalid configuration: SUPABASE_URL: Required; MAX_CONCURRENT_JOBS: Expected number');
    expect(error.issues).toHaveLength(2);
    expect(error.code).toBe('CONFIG_ERROR');
  });
});

describe('isJobError', () => {
  it('should recognize job errors only', () => {
    expect(isJobError(new SerializationError('x'))).toBe(true);
    expect(isJobError(new Error('x'))).toBe(false);
    expect(isJobError('x')).toBe(false);
  });
});
