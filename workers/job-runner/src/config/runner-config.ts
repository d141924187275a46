import * as os from 'os';
import { z } from 'zod';
import {
  ConfigError,
  JOB_LOCK_DURATION_SEC,
  RUNNER_HEARTBEAT_INTERVAL_SEC,
  RUNNER_MAX_CONCURRENT_JOBS,
  RUNNER_POLL_INTERVAL_SEC,
  workerConfigSchema,
  zodIssueLines,
  type WorkerConfig
} from '@typed-jobs/core';

const runnerEnvSchema = z.object({
  SUPABASE_URL: z.string().url(),
  SUPABASE_SERVICE_ROLE_KEY: z.string().min(1),
  JOB_RUNNER_QUEUES: z.string().optional(),
  JOB_RUNNER_INSTANCE_ID: z.string().min(1).optional(),
  MAX_CONCURRENT_JOBS: z.coerce.number().int().positive().default(RUNNER_MAX_CONCURRENT_JOBS),
  JOB_POLL_INTERVAL_SEC: z.coerce.number().positive().default(RUNNER_POLL_INTERVAL_SEC),
  JOB_HEARTBEAT_INTERVAL_SEC: z.coerce.number().int().positive().default(RUNNER_HEARTBEAT_INTERVAL_SEC),
  JOB_LEASE_SECONDS: z.coerce.number().int().positive().default(JOB_LOCK_DURATION_SEC)
});

export type RunnerConfig = {
  supabaseUrl: string;
  supabaseKey: string;
  worker: WorkerConfig;
};

function parseQueues(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
}

/**
 * Validate runner settings from the environment.
 * Throws ConfigError listing every invalid variable.
 */
export function loadRunnerConfig(env: NodeJS.ProcessEnv = process.env): RunnerConfig {
  const result = runnerEnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(zodIssueLines(result.error));
  }

  const vars = result.data;
  return {
    supabaseUrl: vars.SUPABASE_URL,
    supabaseKey: vars.SUPABASE_SERVICE_ROLE_KEY,
    worker: workerConfigSchema.parse({
      jobTypes: parseQueues(vars.JOB_RUNNER_QUEUES),
      instanceId: vars.JOB_RUNNER_INSTANCE_ID ?? `job-runner-${os.hostname()}-${process.pid}`,
      maxConcurrentJobs: vars.MAX_CONCURRENT_JOBS,
      pollInterval: vars.JOB_POLL_INTERVAL_SEC,
      heartbeatInterval: vars.JOB_HEARTBEAT_INTERVAL_SEC,
      leaseSeconds: vars.JOB_LEASE_SECONDS
    })
  };
}
