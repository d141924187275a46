import { z } from 'zod';
import { JOB_DEFAULT_PRIORITY, JOB_MAX_ATTEMPTS } from '../constants';
import { wirePayloadSchema } from './wire-payload.schema';

/**
 * Job state enum
 */
export const jobStateEnum = z.enum([
  'pending',
  'processing',
  'completed',
  'failed'
]);

export type JobState = z.infer<typeof jobStateEnum>;

/**
 * Job row schema - the `jobs` table read by the job runner
 */
export const jobSchema = z.object({
  // Identity
  id: z.string().uuid().describe('Unique job identifier'),
  job_type: z.string().min(1).describe('Registered job name'),

  // Payload
  payload: wirePayloadSchema,

  // State
  state: jobStateEnum.default('pending').describe('Current job state'),

  // Priority & Scheduling
  priority: z.number().int().min(1).max(10).default(JOB_DEFAULT_PRIORITY).describe('Job priority 1-10'),
  scheduled_for: z.string().datetime().describe('When job should run'),

  // Retry bookkeeping, owned by the database functions
  attempts: z.number().int().nonnegative().default(0).describe('Attempt count'),
  max_attempts: z.number().int().positive().default(JOB_MAX_ATTEMPTS).describe('Maximum attempts'),

  // Worker tracking
  locked_until: z.string().datetime().nullable().optional().describe('Lock expiration'),
  locked_by: z.string().nullable().optional().describe('Worker instance ID'),

  // Error tracking
  error: z.string().nullable().optional().describe('Error message'),
  error_details: z.record(z.unknown()).nullable().optional().describe('Error details'),

  started_at: z.string().datetime().nullable().optional(),
  completed_at: z.string().datetime().nullable().optional(),
  created_at: z.string().datetime(),
  updated_at: z.string().datetime()
});

export type Job = z.infer<typeof jobSchema>;

/**
 * Columns supplied when a broker enqueues a job
 */
export const newJobSchema = jobSchema.pick({
  job_type: true,
  payload: true,
  priority: true,
  scheduled_for: true,
  max_attempts: true
});

export type NewJob = z.input<typeof newJobSchema>;
export type NewJobRow = z.infer<typeof newJobSchema>;
