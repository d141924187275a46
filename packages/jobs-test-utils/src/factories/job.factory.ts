import { faker } from '@faker-js/faker';
import type { ClaimedJob, Job, JobState, WirePayload } from '@typed-jobs/core';

export interface JobRowFactoryOptions {
  id?: string;
  job_type?: string;
  payload?: WirePayload;
  state?: JobState;
  priority?: number;
  scheduled_for?: string;
  attempts?: number;
  max_attempts?: number;
  locked_until?: string | null;
  locked_by?: string | null;
  error?: string | null;
  error_details?: Record<string, unknown> | null;
  started_at?: string | null;
  completed_at?: string | null;
  created_at?: string;
  updated_at?: string;
}

export function createJobRow(options: JobRowFactoryOptions = {}): Job {
  const now = new Date().toISOString();

  return {
    id: options.id ?? faker.string.uuid(),
    job_type: options.job_type ?? faker.helpers.arrayElement(['SendEmail', 'ResizeImage', 'SyncAccount']),
    payload: options.payload ?? {},
    state: options.state ?? 'pending',
    priority: options.priority ?? 5,
    scheduled_for: options.scheduled_for ?? now,
    attempts: options.attempts ?? 0,
    max_attempts: options.max_attempts ?? 3,
    locked_until: options.locked_until ?? null,
    locked_by: options.locked_by ?? null,
    error: options.error ?? null,
    error_details: options.error_details ?? null,
    started_at: options.started_at ?? null,
    completed_at: options.completed_at ?? null,
    created_at: options.created_at ?? faker.date.past().toISOString(),
    updated_at: options.updated_at ?? now
  };
}

export function createJobRowInState(state: JobState, options: JobRowFactoryOptions = {}): Job {
  return createJobRow({ ...options, state });
}

export function createJobRows(count: number, options: JobRowFactoryOptions = {}): Job[] {
  return Array.from({ length: count }, () => createJobRow(options));
}

export interface ClaimedJobFactoryOptions {
  job_id?: string;
  job_type?: string;
  payload?: WirePayload;
  attempts?: number;
  max_attempts?: number;
}

/**
 * Row shape handed out by the claim_job RPC
 */
export function createClaimedJob(options: ClaimedJobFactoryOptions = {}): ClaimedJob {
  return {
    job_id: options.job_id ?? faker.string.uuid(),
    job_type: options.job_type ?? faker.helpers.arrayElement(['SendEmail', 'ResizeImage', 'SyncAccount']),
    payload: options.payload ?? {},
    attempts: options.attempts ?? 1,
    max_attempts: options.max_attempts ?? 3
  };
}
