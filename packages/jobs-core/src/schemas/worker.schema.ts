import { z } from 'zod';
import {
  JOB_LOCK_DURATION_SEC,
  RUNNER_HEARTBEAT_INTERVAL_SEC,
  RUNNER_MAX_CONCURRENT_JOBS,
  RUNNER_POLL_INTERVAL_SEC
} from '../constants';
import { wirePayloadSchema } from './wire-payload.schema';

/**
 * Job runner configuration
 */
export const workerConfigSchema = z.object({
  jobTypes: z.array(z.string().min(1)).describe('Job names this runner claims; empty means every registered job'),
  instanceId: z.string().min(1).describe('Unique instance identifier'),
  maxConcurrentJobs: z.number().int().positive().default(RUNNER_MAX_CONCURRENT_JOBS).describe('Max concurrent jobs'),
  pollInterval: z.number().positive().default(RUNNER_POLL_INTERVAL_SEC).describe('Poll interval in seconds'),
  heartbeatInterval: z.number().int().positive().default(RUNNER_HEARTBEAT_INTERVAL_SEC).describe('Heartbeat interval in seconds'),
  leaseSeconds: z.number().int().positive().default(JOB_LOCK_DURATION_SEC).describe('Job lease duration in seconds')
});

export type WorkerConfig = z.infer<typeof workerConfigSchema>;
export type WorkerConfigInput = z.input<typeof workerConfigSchema>;

/**
 * Claimed job returned by claim_job function
 * (matches the RPC function return type)
 */
export const claimedJobSchema = z.object({
  job_id: z.string().uuid().describe('Job ID'),
  job_type: z.string().min(1).describe('Job type'),
  payload: wirePayloadSchema,
  attempts: z.number().int().nonnegative().describe('Attempt count'),
  max_attempts: z.number().int().positive().describe('Maximum attempts')
});

export type ClaimedJob = z.infer<typeof claimedJobSchema>;
