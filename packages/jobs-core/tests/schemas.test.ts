import { describe, it, expect } from 'vitest';
import { claimedJobSchema, jobSchema, newJobSchema, wirePayloadSchema, workerConfigSchema } from '../src/schemas';
import { toScheduleDate, isValidDelay, describeValueType, isPlainObject } from '../src/utils';

describe('Wire Payload Schema', () => {
  it('should accept nested JSON values', () => {
    const payload = { id: 1, tags: ['a'], nested: { ok: true, nothing: null } };

    expect(wirePayloadSchema.parse(payload)).toEqual(payload);
  });

  it('should reject values JSON cannot hold', () => {
    expect(() => wirePayloadSchema.parse({ value: Number.POSITIVE_INFINITY })).toThrow();
    expect(() => wirePayloadSchema.parse({ value: new Date() })).toThrow();
  });
});

describe('Job Schema', () => {
  const now = '2030-01-01T00:00:00.000Z';

  it('should validate a job row and fill defaults', () => {
    const job = jobSchema.parse({
      id: '123e4567-e89b-12d3-a456-426614174000',
      job_type: 'SimpleJob',
      payload: { value: 1 },
      scheduled_for: now,
      created_at: now,
      updated_at: now
    });

    expect(job.state).toBe('pending');
    expect(job.priority).toBe(5);
    expect(job.max_attempts).toBe(3);
  });

  it('should reject an invalid state', () => {
    expect(() =>
      jobSchema.parse({
        id: '123e4567-e89b-12d3-a456-426614174000',
        job_type: 'SimpleJob',
        payload: {},
        state: 'sleeping',
        scheduled_for: now,
        created_at: now,
        updated_at: now
      })
    ).toThrow();
  });

  it('should validate new job rows', () => {
    expect(newJobSchema.parse({ job_type: 'SimpleJob', payload: {}, scheduled_for: now })).toEqual({
      job_type: 'SimpleJob',
      payload: {},
      priority: 5,
      scheduled_for: now,
      max_attempts: 3
    });
  });
});

describe('Worker Schemas', () => {
  it('should apply runner defaults', () => {
    expect(workerConfigSchema.parse({ jobTypes: [], instanceId: 'runner-1' })).toEqual({
      jobTypes: [],
      instanceId: 'runner-1',
      maxConcurrentJobs: 3,
      pollInterval: 5,
      heartbeatInterval: 30,
      leaseSeconds: 300
    });
  });

  it('should reject a claimed job without a uuid', () => {
    expect(() =>
      claimedJobSchema.parse({ job_id: 'job-1', job_type: 'SimpleJob', payload: {}, attempts: 1, max_attempts: 3 })
    ).toThrow();
  });
});

describe('utils', () => {
  it('should read epoch seconds as schedule times', () => {
    expect(toScheduleDate(0)).toEqual(new Date(0));
    expect(toScheduleDate(new Date('invalid'))).toBeNull();
  });

  it('should accept finite non-negative delays', () => {
    expect(isValidDelay(0)).toBe(true);
    expect(isValidDelay(1.5)).toBe(true);
    expect(isValidDelay(-0.1)).toBe(false);
    expect(isValidDelay(Number.POSITIVE_INFINITY)).toBe(false);
  });

  it('should name value types', () => {
    expect(describeValueType(null)).toBe('null');
    expect(describeValueType([])).toBe('Array');
    expect(describeValueType('x')).toBe('string');
    expect(describeValueType(new Map())).toBe('Map');
    expect(describeValueType({})).toBe('Object');
  });

  it('should tell plain objects apart', () => {
    expect(isPlainObject({})).toBe(true);
    expect(isPlainObject(Object.create(null))).toBe(true);
    expect(isPlainObject(new Date())).toBe(false);
    expect(isPlainObject([])).toBe(false);
  });
});
