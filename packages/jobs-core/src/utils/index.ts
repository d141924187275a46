export * from './object.utils';
export * from './time.utils';
