export * from './postgres-broker';
