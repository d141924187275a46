import { faker } from '@faker-js/faker';
import { addMilliseconds } from 'date-fns';
import type { JobBroker, JobRegistry, WirePayload } from '@typed-jobs/core';

export type FakeBrokerMode = 'fake' | 'inline';

export interface FakeBrokerOptions {
  /** `fake` records jobs until drained; `inline` dispatches on submit */
  mode?: FakeBrokerMode;
  now?: () => Date;
}

export interface FakeJob {
  id: string;
  jobName: string;
  payload: WirePayload;
  runAt: Date;
  enqueuedAt: Date;
}

/**
 * In-process broker for tests. Payloads go through a JSON round trip before
 * dispatch, so jobs see exactly what a real queue would hand back.
 */
export class FakeBroker implements JobBroker {
  mode: FakeBrokerMode;

  private readonly registry: JobRegistry;
  private readonly now: () => Date;
  private queue: FakeJob[] = [];

  constructor(registry: JobRegistry, options: FakeBrokerOptions = {}) {
    this.registry = registry;
    this.mode = options.mode ?? 'fake';
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

  get jobs(): readonly FakeJob[] {
    return [...this.queue];
  }

  jobsFor(jobName: string): FakeJob[] {
    return this.queue.filter((job) => job.jobName === jobName);
  }

  /**
   * Dispatch every job that is due, including jobs enqueued while draining.
   * Returns the number of jobs run.
   */
  async drain(): Promise<number> {
    let count = 0;
    for (;;) {
      const now = this.now().getTime();
      const next = this.queue.find((job) => job.runAt.getTime() <= now);
      if (next === undefined) return count;

      this.queue = this.queue.filter((job) => job !== next);
      await this.run(next.id, next.jobName, next.payload);
      count += 1;
    }
  }

  clear(): void {
    this.queue = [];
  }

  private async enqueue(jobName: string, runAt: Date, payload: WirePayload): Promise<string> {
    const id = faker.string.uuid();

    if (this.mode === 'inline') {
      await this.run(id, jobName, payload);
      return id;
    }

    this.queue.push({ id, jobName, payload, runAt, enqueuedAt: this.now() });
    return id;
  }

  private async run(id: string, jobName: string, payload: WirePayload): Promise<void> {
    const wire: unknown = JSON.parse(JSON.stringify(payload));
    await this.registry.dispatch(jobName, wire, { jobId: id, attempt: 1 });
  }
}
