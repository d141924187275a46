import { JobError } from '../errors';
import type { DispatchMeta, DispatchTarget } from './job.types';

/**
 * Routes broker payloads to jobs by name
 */
export class JobRegistry {
  private readonly jobs = new Map<string, DispatchTarget>();

  constructor(jobs: readonly DispatchTarget[] = []) {
    this.register(...jobs);
  }

  register(...jobs: DispatchTarget[]): this {
    for (const job of jobs) {
      if (this.jobs.has(job.name)) {
        throw new JobError(`Job ${job.name} is already registered`, { jobName: job.name });
      }
      this.jobs.set(job.name, job);
    }
    return this;
  }

  get(name: string): DispatchTarget | undefined {
    return this.jobs.get(name);
  }

  names(): string[] {
    return [...this.jobs.keys()];
  }

  async dispatch(name: string, payload: unknown, meta: DispatchMeta = {}): Promise<unknown> {
    const job = this.jobs.get(name);
    if (job === undefined) {
      throw new JobError(`Unknown job ${name}`, { jobName: name });
    }
    return job.dispatch(payload, meta);
  }
}
