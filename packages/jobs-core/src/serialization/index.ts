export * from './wire-serializer';
export * from './wire-coercion';
export * from './zod-issues';
