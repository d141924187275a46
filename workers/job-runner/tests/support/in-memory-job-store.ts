import { createJobRow } from '@typed-jobs/test-utils';
import type { Job, NewJobRow } from '@typed-jobs/core';
import type { HeartbeatReport, JobFailure, JobStore } from '../../src';

/**
 * JobStore holding rows in memory, with the claim/fail rules of the SQL functions
 */
export class InMemoryJobStore implements JobStore {
  rows: Job[] = [];
  heartbeats: HeartbeatReport[] = [];
  now: () => Date = () => new Date();

  async enqueue(row: NewJobRow): Promise<string> {
    const job = createJobRow({ ...row, state: 'pending', attempts: 0 });
    this.rows.push(job);
    return job.id;
  }

  async claim(jobTypes: readonly string[], workerId: string, leaseSeconds: number): Promise<unknown> {
    const now = this.now();
    const job = this.rows
      .filter(
        (row) =>
          jobTypes.includes(row.job_type) &&
          row.state === 'pending' &&
          new Date(row.scheduled_for) <= now &&
          row.attempts < row.max_attempts
      )
      .sort((a, b) => b.priority - a.priority || a.scheduled_for.localeCompare(b.scheduled_for))[0];

    if (job === undefined) return null;

    job.state = 'processing';
    job.attempts += 1;
    job.locked_by = workerId;
    job.locked_until = new Date(now.getTime() + leaseSeconds * 1000).toISOString();

    return {
      job_id: job.id,
      job_type: job.job_type,
      payload: job.payload,
      attempts: job.attempts,
      max_attempts: job.max_attempts
    };
  }

  async complete(jobId: string): Promise<void> {
    const job = this.find(jobId);
    job.state = 'completed';
    job.locked_by = null;
    job.locked_until = null;
  }

  async fail(jobId: string, failure: JobFailure): Promise<void> {
    const job = this.find(jobId);
    job.state = job.attempts >= job.max_attempts ? 'failed' : 'pending';
    job.error = failure.message;
    job.error_details = failure.details;
    job.locked_by = null;
    job.locked_until = null;
  }

  async heartbeat(report: HeartbeatReport): Promise<void> {
    this.heartbeats.push(report);
  }

  private find(jobId: string): Job {
    const job = this.rows.find((row) => row.id === jobId);
    if (job === undefined) {
      throw new Error(`No job ${jobId}`);
    }
    return job;
  }
}
