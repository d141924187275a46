import type { z } from 'zod';
import type { ExecutionContext } from './execution-context';

/**
 * Argument schemas are zod object schemas; field names are the object keys
 */
export type ArgumentSchema = z.AnyZodObject;

export type EmptyArgs = Record<never, never>;

/**
 * Typed arguments a work body reads, or no fields for argument-less jobs
 */
export type JobArgs<TSchema> = TSchema extends ArgumentSchema ? z.output<TSchema> : EmptyArgs;

/**
 * Caller input before strict validation
 */
export type RawArguments = Record<string, unknown>;

export interface JobDefinition<TSchema extends z.ZodTypeAny | undefined = undefined, TResult = unknown> {
  /** Job name, used in error messages and as the broker routing key */
  readonly name: string;
  readonly args?: TSchema;
  run?(context: ExecutionContext<JobArgs<TSchema>>): TResult | Promise<TResult>;
}

/**
 * Broker-provided details about the execution being dispatched
 */
export type DispatchMeta = {
  jobId?: string;
  attempt?: number;
};

/**
 * What a broker needs to route a payload back into a job
 */
export interface DispatchTarget {
  readonly name: string;
  dispatch(payload: unknown, meta?: DispatchMeta): Promise<unknown>;
}
