export * from './base.error';
export * from './invalid-args.error';
export * from './schema-not-defined.error';
export * from './serialization.error';
export * from './not-implemented.error';
export * from './config.error';
