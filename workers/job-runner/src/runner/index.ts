export * from './job-runner';
export * from './run-worker';
