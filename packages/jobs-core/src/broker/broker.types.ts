import type { WirePayload } from '../schemas';

/**
 * Job backend contract. Implementations persist the payload and later call
 * `JobRegistry.dispatch` with the job name and the exact payload submitted.
 * Retries, ordering and delivery guarantees belong to the broker.
 */
export interface JobBroker {
  submit(jobName: string, payload: WirePayload): Promise<string>;
  scheduleAt(jobName: string, at: Date, payload: WirePayload): Promise<string>;
  scheduleIn(jobName: string, delaySeconds: number, payload: WirePayload): Promise<string>;
}
