export * from './field-descriptors';
