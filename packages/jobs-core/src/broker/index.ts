export type { JobBroker } from './broker.types';
