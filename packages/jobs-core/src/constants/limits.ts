/**
 * Job defaults and thresholds
 */

// Job limits
export const JOB_MAX_ATTEMPTS = 3;
export const JOB_DEFAULT_PRIORITY = 5;
export const JOB_LOCK_DURATION_SEC = 300; // 5 minutes

// Runner defaults
export const RUNNER_MAX_CONCURRENT_JOBS = 3;
export const RUNNER_POLL_INTERVAL_SEC = 5;
export const RUNNER_HEARTBEAT_INTERVAL_SEC = 30;
