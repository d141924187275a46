import type { z } from 'zod';
import type { JobBroker } from '../broker';
import { InvalidArgsError, isJobError, JobError, NotImplementedError } from '../errors';
import { createLogger, type Logger } from '../logger';
import { defaultSchemaRegistry, type SchemaRegistry } from '../registry';
import { describeFields, type FieldDescriptor } from '../introspection';
import { deserializeArguments, formatZodIssues, serializeArguments } from '../serialization';
import type { WirePayload } from '../schemas';
import { isPlainObject, isValidDelay, toScheduleDate } from '../utils';
import { ExecutionContext } from './execution-context';
import type { ArgumentSchema, DispatchMeta, JobArgs, JobDefinition, RawArguments } from './job.types';

const logger = createLogger('job-pipeline');

export type JobPipelineOptions = {
  broker?: JobBroker;
  registry?: SchemaRegistry;
  logger?: Logger;
};

/**
 * Typed entry points for one job definition.
 *
 * Submission validates strictly, serializes and hands the payload to the
 * broker. Dispatch deserializes with coercion and runs the body. Inline
 * execution skips the wire entirely.
 */
export class JobPipeline<TSchema extends z.ZodTypeAny | undefined = undefined, TResult = unknown> {
  readonly name: string;

  private readonly definition: JobDefinition<TSchema, TResult>;
  private readonly broker?: JobBroker;
  private readonly registry: SchemaRegistry;
  private readonly logger: Logger;

  constructor(definition: JobDefinition<TSchema, TResult>, options: JobPipelineOptions = {}) {
    this.name = definition.name;
    this.definition = definition;
    this.broker = options.broker;
    this.registry = options.registry ?? defaultSchemaRegistry;
    this.logger = options.logger ?? logger;
  }

  /**
   * Same job, submitting through another broker
   */
  withBroker(broker: JobBroker): JobPipeline<TSchema, TResult> {
    return new JobPipeline(this.definition, {
      broker,
      registry: this.registry,
      logger: this.logger
    });
  }

  /**
   * Resolved argument schema, or undefined when the job takes no arguments
   */
  schema(): ArgumentSchema | undefined {
    return this.registry.resolve(this.definition);
  }

  /**
   * Declared argument fields, in declaration order
   */
  fields(): FieldDescriptor[] {
    return describeFields(this.schema());
  }

  /**
   * Strictly validate caller input. Unknown keys, missing required fields and
   * type mismatches all fail; nothing is coerced.
   */
  buildArguments(input: unknown = {}): JobArgs<TSchema> | undefined {
    const schema = this.schema();
    if (schema === undefined) {
      return undefined;
    }

    if (!isPlainObject(input)) {
      throw new InvalidArgsError(`Invalid arguments for ${this.name}: expected an object of named arguments`, {
        jobName: this.name
      });
    }

    const unknownKeys = Object.keys(input).filter((key) => !Object.hasOwn(schema.shape, key));
    if (unknownKeys.length > 0) {
      const keys = unknownKeys.map((key) => `'${key}'`).join(', ');
      throw new InvalidArgsError(`Invalid arguments for ${this.name}: Unrecognized key(s) in object: ${keys}`, {
        jobName: this.name,
        context: { unknownKeys }
      });
    }

    const parser: z.ZodTypeAny = schema;
    const result = parser.safeParse(input);
    if (!result.success) {
      throw new InvalidArgsError(`Invalid arguments for ${this.name}: ${formatZodIssues(result.error)}`, {
        jobName: this.name,
        cause: result.error
      });
    }

    const args: JobArgs<TSchema> = result.data;
    return args;
  }

  /**
   * Validate, serialize and enqueue for immediate execution
   */
  async submit(input?: RawArguments): Promise<string> {
    const payload = this.prepare(input);
    const jobId = await this.requireBroker().submit(this.name, payload);
    this.logger.debug({ job: this.name, jobId }, 'Job submitted');
    return jobId;
  }

  /**
   * Validate, serialize and enqueue for execution at `time` (a Date or epoch seconds)
   */
  async scheduleAt(time: Date | number, input?: RawArguments): Promise<string> {
    const payload = this.prepare(input);
    const at = toScheduleDate(time);
    if (at === null) {
      throw new JobError(`Invalid schedule time for ${this.name}: ${String(time)}`, { jobName: this.name });
    }
    const jobId = await this.requireBroker().scheduleAt(this.name, at, payload);
    this.logger.debug({ job: this.name, jobId, at: at.toISOString() }, 'Job scheduled');
    return jobId;
  }

  /**
   * Validate, serialize and enqueue for execution after `delaySeconds`
   */
  async scheduleIn(delaySeconds: number, input?: RawArguments): Promise<string> {
    const payload = this.prepare(input);
    if (!isValidDelay(delaySeconds)) {
      throw new JobError(`Invalid schedule delay for ${this.name}: ${delaySeconds}`, { jobName: this.name });
    }
    const jobId = await this.requireBroker().scheduleIn(this.name, delaySeconds, payload);
    this.logger.debug({ job: this.name, jobId, delaySeconds }, 'Job scheduled');
    return jobId;
  }

  /**
   * Build arguments and run the body in-process, without touching the wire
   */
  async runSynchronously(input?: RawArguments): Promise<Awaited<TResult>> {
    const args = this.buildArguments(input);
    return this.execute(args, {});
  }

  /**
   * Entry point for brokers: read a wire payload back and run the body.
   * Deserialization failures propagate as SerializationError, unwrapped.
   */
  async dispatch(payload: unknown, meta: DispatchMeta = {}): Promise<Awaited<TResult>> {
    const schema = this.schema();
    const args: JobArgs<TSchema> | undefined = deserializeArguments(this.name, schema, payload);
    this.logger.debug({ job: this.name, jobId: meta.jobId }, 'Job dispatched');
    return this.execute(args, meta);
  }

  /**
   * Serialize already-built arguments; exposed for brokers and tests
   */
  serialize(args: JobArgs<TSchema> | undefined): WirePayload {
    return serializeArguments(this.name, this.schema(), args);
  }

  private prepare(input: RawArguments | undefined): WirePayload {
    return this.serialize(this.buildArguments(input));
  }

  private requireBroker(): JobBroker {
    if (this.broker === undefined) {
      throw new JobError(`No broker configured for ${this.name}`, { jobName: this.name });
    }
    return this.broker;
  }

  private async execute(args: JobArgs<TSchema> | undefined, meta: DispatchMeta): Promise<Awaited<TResult>> {
    if (this.definition.run === undefined) {
      throw new NotImplementedError(`${this.name} must implement run()`, { jobName: this.name });
    }

    const shape: Record<string, unknown> = this.schema()?.shape ?? {};
    const context = new ExecutionContext<JobArgs<TSchema>>({
      jobName: this.name,
      args,
      fieldNames: Object.keys(shape),
      logger: this.logger.child({ job: this.name, jobId: meta.jobId }),
      jobId: meta.jobId,
      attempt: meta.attempt
    });

    try {
      return await this.definition.run(context);
    } catch (error) {
      if (isJobError(error)) {
        throw error;
      }
      throw this.wrapFailure(error);
    }
  }

  private wrapFailure(error: unknown): JobError {
    const message = error instanceof Error ? error.message : String(error);
    const stack = error instanceof Error && error.stack ? `\n${error.stack}` : '';
    this.logger.error({ job: this.name, error: message }, 'Job body failed');
    return new JobError(`Error in ${this.name}#run: ${message}${stack}`, {
      jobName: this.name,
      cause: error
    });
  }
}
