import type { NewJobRow } from '@typed-jobs/core';

export type JobFailure = {
  message: string;
  details: Record<string, unknown>;
};

export type HeartbeatReport = {
  instanceId: string;
  jobsInFlight: number;
  uptimeSec: number;
};

/**
 * Persistence behind the Postgres broker and the job runner
 */
export interface JobStore {
  /** Insert a job row and return its id */
  enqueue(row: NewJobRow): Promise<string>;
  /**
   * Lease the next due job of one of `jobTypes` for `workerId`.
   * Resolves to the raw claimed row, or null when nothing is due.
   */
  claim(jobTypes: readonly string[], workerId: string, leaseSeconds: number): Promise<unknown>;
  complete(jobId: string): Promise<void>;
  fail(jobId: string, failure: JobFailure): Promise<void>;
  heartbeat(report: HeartbeatReport): Promise<void>;
}
