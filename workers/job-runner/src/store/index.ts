export type { HeartbeatReport, JobFailure, JobStore } from './job-store';
export * from './supabase-job-store';
