// Configuration
export * from './config';

// Persistence
export * from './store';

// Broker
export * from './broker';

// Runner
export * from './runner';
