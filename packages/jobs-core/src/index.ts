// Jobs
export * from './job';
export * from './broker';

// Schemas and types
export * from './schemas';
export * from './registry';
export * from './serialization';
export * from './introspection';

// Errors
export * from './errors';

// Logger
export * from './logger';

// Utils
export * from './utils';

// Constants
export * from './constants';
