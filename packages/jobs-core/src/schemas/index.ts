export * from './wire-payload.schema';
export * from './jobs.schema';
export * from './worker.schema';
