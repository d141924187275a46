// Factories
export * from './factories/job.factory';

// Fakes
export * from './fakes/fake-broker';

// Helpers
export * from './helpers/wait.helper';
