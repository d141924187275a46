import {
  claimedJobSchema,
  createLogger,
  formatZodIssues,
  isJobError,
  isPlainObject,
  workerConfigSchema,
  type ClaimedJob,
  type JobRegistry,
  type Logger,
  type WorkerConfig,
  type WorkerConfigInput
} from '@typed-jobs/core';
import type { JobStore } from '../store';

export type JobRunnerOptions = {
  store: JobStore;
  registry: JobRegistry;
  config: WorkerConfigInput;
  logger?: Logger;
};

/**
 * Polls the job store, dispatches claimed jobs through the registry and
 * records the outcome. A failing job never stops the loop.
 */
export class JobRunner {
  readonly config: WorkerConfig;

  private readonly store: JobStore;
  private readonly registry: JobRegistry;
  private readonly logger: Logger;
  private running = false;
  private inFlight = new Set<Promise<void>>();
  private pollTimer?: NodeJS.Timeout;
  private heartbeatTimer?: NodeJS.Timeout;

  constructor(options: JobRunnerOptions) {
    this.config = workerConfigSchema.parse(options.config);
    this.store = options.store;
    this.registry = options.registry;
    this.logger = options.logger ?? createLogger('job-runner', { instanceId: this.config.instanceId });

    this.logger.info({ config: this.config }, 'Job runner initialized');
  }

  get jobsInFlight(): number {
    return this.inFlight.size;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Job names this runner claims
   */
  jobTypes(): string[] {
    return this.config.jobTypes.length > 0 ? [...this.config.jobTypes] : this.registry.names();
  }

  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;

    this.logger.info({ jobTypes: this.jobTypes() }, 'Job runner starting');

    this.startHeartbeat();
    this.pollTimer = setInterval(() => {
      void this.poll();
    }, this.config.pollInterval * 1000);

    await this.poll();
  }

  /**
   * Stop claiming and wait for in-flight jobs to settle
   */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.logger.info('Job runner stopping');
    this.running = false;

    clearInterval(this.pollTimer);
    clearInterval(this.heartbeatTimer);

    if (this.inFlight.size > 0) {
      this.logger.info({ jobsInFlight: this.inFlight.size }, 'Waiting for jobs to complete');
    }
    await this.onIdle();

    this.logger.info('Job runner stopped');
  }

  /**
   * Claim jobs until the concurrency limit is reached or nothing is due.
   * Returns the number of jobs claimed.
   */
  async poll(): Promise<number> {
    let claimed = 0;

    while (this.running && this.inFlight.size < this.config.maxConcurrentJobs) {
      let job: ClaimedJob | null;
      try {
        job = await this.claimJob();
      } catch (error) {
        this.logger.error({ error }, 'Failed to check for jobs');
        return claimed;
      }

      if (job === null) return claimed;
      claimed++;
      this.track(this.processJob(job));
    }

    return claimed;
  }

  /**
   * Resolves once every job in flight has been completed or failed
   */
  async onIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  private track(work: Promise<void>): void {
    const tracked = work
      .catch((error: unknown) => {
        this.logger.error({ error }, 'Job processing error');
      })
      .finally(() => {
        this.inFlight.delete(tracked);
      });
    this.inFlight.add(tracked);
  }

  private async claimJob(): Promise<ClaimedJob | null> {
    const raw = await this.store.claim(this.jobTypes(), this.config.instanceId, this.config.leaseSeconds);
    if (raw === null || raw === undefined) {
      return null;
    }

    const parsed = claimedJobSchema.safeParse(raw);
    if (!parsed.success) {
      await this.rejectMalformed(raw, formatZodIssues(parsed.error));
      return null;
    }

    const job = parsed.data;
    this.logger.info({ jobId: job.job_id, jobType: job.job_type, attempt: job.attempts }, 'Job claimed');
    return job;
  }

  private async rejectMalformed(raw: unknown, issues: string): Promise<void> {
    const jobId = isPlainObject(raw) && typeof raw.job_id === 'string' ? raw.job_id : undefined;
    this.logger.error({ jobId, issues }, 'Claimed job is malformed');
    if (jobId === undefined) return;

    await this.store.fail(jobId, {
      message: `Malformed job row: ${issues}`,
      details: { timestamp: new Date().toISOString() }
    });
  }

  private async processJob(job: ClaimedJob): Promise<void> {
    const startTime = Date.now();

    try {
      await this.registry.dispatch(job.job_type, job.payload, { jobId: job.job_id, attempt: job.attempts });
      await this.store.complete(job.job_id);

      this.logger.info({ jobId: job.job_id, jobType: job.job_type, duration: Date.now() - startTime }, 'Job completed');
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);

      this.logger.error(
        { jobId: job.job_id, jobType: job.job_type, error: errorMessage, duration: Date.now() - startTime },
        'Job failed'
      );

      await this.store.fail(job.job_id, {
        message: errorMessage,
        details: {
          code: isJobError(error) ? error.code : undefined,
          stack: error instanceof Error ? error.stack : undefined,
          attempt: job.attempts,
          timestamp: new Date().toISOString()
        }
      });
    }
  }

  private startHeartbeat(): void {
    this.heartbeatTimer = setInterval(() => {
      void this.sendHeartbeat();
    }, this.config.heartbeatInterval * 1000);
  }

  async sendHeartbeat(): Promise<void> {
    if (!this.running) return;

    try {
      await this.store.heartbeat({
        instanceId: this.config.instanceId,
        jobsInFlight: this.inFlight.size,
        uptimeSec: process.uptime()
      });
    } catch (error) {
      this.logger.error({ error }, 'Heartbeat error');
    }
  }
}
