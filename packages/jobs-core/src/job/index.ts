export * from './job.types';
export * from './execution-context';
export * from './job-pipeline';
export * from './define-job';
export * from './job-registry';
