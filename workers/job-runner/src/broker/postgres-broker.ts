import { addMilliseconds } from 'date-fns';
import {
  createLogger,
  JOB_DEFAULT_PRIORITY,
  JOB_MAX_ATTEMPTS,
  newJobSchema,
  type JobBroker,
  type WirePayload
} from '@typed-jobs/core';
import type { JobStore } from '../store';

const logger = createLogger('postgres-broker');

export type PostgresBrokerOptions = {
  priority?: number;
  maxAttempts?: number;
  now?: () => Date;
};

/**
 * JobBroker writing rows into the jobs table through a JobStore
 */
export class PostgresBroker implements JobBroker {
  private readonly store: JobStore;
  private readonly priority: number;
  private readonly maxAttempts: number;
  private readonly now: () => Date;

  constructor(store: JobStore, options: PostgresBrokerOptions = {}) {
    this.store = store;
    this.priority = options.priority ?? JOB_DEFAULT_PRIORITY;
    this.maxAttempts = options.maxAttempts ?? JOB_MAX_ATTEMPTS;
    this.now = options.now ?? (() => new Date());
  }

  async submit(jobName: string, payload: WirePayload): Promise<string> {
    return this.enqueue(jobName, this.now(), payload);
  }

  async scheduleAt(jobName: string, at: Date, payload: WirePayload): Promise<string> {
    return this.enqueue(jobName, at, payload);
  }

  async scheduleIn(jobName: string, delaySeconds: number, payload: WirePayload): Promise<string> {
    return this.enqueue(jobName, addMilliseconds(this.now(), delaySeconds * 1000), payload);
  }

  private async enqueue(jobName: string, scheduledFor: Date, payload: WirePayload): Promise<string> {
    const row = newJobSchema.parse({
      job_type: jobName,
      payload,
      priority: this.priority,
      scheduled_for: scheduledFor.toISOString(),
      max_attempts: this.maxAttempts
    });

    const jobId = await this.store.enqueue(row);
    logger.info({ jobId, jobType: jobName, scheduledFor: row.scheduled_for }, 'Job enqueued');
    return jobId;
  }
}
