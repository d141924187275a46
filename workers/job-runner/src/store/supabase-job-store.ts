import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { createLogger, JobError, type NewJobRow } from '@typed-jobs/core';
import type { RunnerConfig } from '../config';
import type { HeartbeatReport, JobFailure, JobStore } from './job-store';

const logger = createLogger('supabase-job-store');

const jobIdSchema = z.string().uuid();

/**
 * JobStore over the `jobs` table and its enqueue_job / claim_job /
 * complete_job / fail_job database functions
 */
export class SupabaseJobStore implements JobStore {
  private db: SupabaseClient;

  constructor(db: SupabaseClient) {
    this.db = db;
  }

  static fromConfig(config: Pick<RunnerConfig, 'supabaseUrl' | 'supabaseKey'>): SupabaseJobStore {
    return new SupabaseJobStore(createClient(config.supabaseUrl, config.supabaseKey));
  }

  async enqueue(row: NewJobRow): Promise<string> {
    const { data, error } = await this.db.rpc('enqueue_job', {
      p_job_type: row.job_type,
      p_payload: row.payload,
      p_priority: row.priority,
      p_scheduled_for: row.scheduled_for,
      p_max_attempts: row.max_attempts
    });

    if (error) {
      logger.error({ error, jobType: row.job_type }, 'Failed to enqueue job');
      throw new JobError(`Failed to enqueue ${row.job_type}: ${error.message}`, { jobName: row.job_type, cause: error });
    }

    const jobId = jobIdSchema.safeParse(data);
    if (!jobId.success) {
      throw new JobError(`enqueue_job returned no job id for ${row.job_type}`, { jobName: row.job_type });
    }

    return jobId.data;
  }

  async claim(jobTypes: readonly string[], workerId: string, leaseSeconds: number): Promise<unknown> {
    const { data, error } = await this.db.rpc('claim_job', {
      p_job_types: jobTypes,
      p_worker_id: workerId,
      p_lease_seconds: leaseSeconds
    });

    if (error) {
      throw new JobError(`Failed to claim job: ${error.message}`, { cause: error });
    }

    const rows: unknown = data;
    if (!Array.isArray(rows) || rows.length === 0) {
      return null;
    }

    const row: unknown = rows[0];
    return row;
  }

  async complete(jobId: string): Promise<void> {
    const { error } = await this.db.rpc('complete_job', {
      p_job_id: jobId
    });

    if (error) {
      throw new JobError(`Failed to complete job ${jobId}: ${error.message}`, { cause: error });
    }
  }

  async fail(jobId: string, failure: JobFailure): Promise<void> {
    const { error } = await this.db.rpc('fail_job', {
      p_job_id: jobId,
      p_error: failure.message,
      p_error_details: failure.details
    });

    if (error) {
      throw new JobError(`Failed to record failure of job ${jobId}: ${error.message}`, { cause: error });
    }
  }

  async heartbeat(report: HeartbeatReport): Promise<void> {
    const { error } = await this.db.from('health_checks').upsert({
      worker_type: 'job_runner',
      instance_id: report.instanceId,
      status: 'healthy',
      last_heartbeat: new Date().toISOString(),
      metrics: {
        jobs_in_flight: report.jobsInFlight,
        uptime_sec: report.uptimeSec
      }
    });

    if (error) {
      throw new JobError(`Failed to send heartbeat: ${error.message}`, { cause: error });
    }
  }
}
