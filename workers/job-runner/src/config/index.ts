export * from './runner-config';
