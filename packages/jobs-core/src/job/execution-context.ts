import { JobError } from '../errors';
import type { Logger } from '../logger';

export type ExecutionContextOptions<TArgs> = {
  jobName: string;
  args: TArgs | undefined;
  fieldNames: readonly string[];
  logger: Logger;
  jobId?: string;
  attempt?: number;
};

/**
 * Runtime state of one job invocation.
 *
 * Fields are read through `get(field)`; nothing is defined on the context per
 * field, so argument names never shadow members a job author relies on.
 */
export class ExecutionContext<TArgs> {
  readonly jobName: string;
  readonly jobId?: string;
  readonly attempt?: number;
  readonly logger: Logger;

  private readonly bundle: { value: TArgs } | undefined;
  private readonly fieldNames: ReadonlySet<string>;

  constructor(options: ExecutionContextOptions<TArgs>) {
    const { args } = options;
    this.jobName = options.jobName;
    this.jobId = options.jobId;
    this.attempt = options.attempt;
    this.logger = options.logger;
    this.bundle = args === undefined ? undefined : { value: args };
    this.fieldNames = new Set(options.fieldNames);
  }

  /**
   * The whole typed arguments object, or undefined for argument-less jobs
   */
  get args(): TArgs | undefined {
    return this.bundle?.value;
  }

  get<K extends keyof TArgs & string>(field: K): TArgs[K] {
    if (this.bundle === undefined || !this.fieldNames.has(field)) {
      throw new JobError(`${this.jobName} has no argument '${field}'`, { jobName: this.jobName });
    }
    return this.bundle.value[field];
  }

  has(field: string): field is keyof TArgs & string {
    return this.bundle !== undefined && this.fieldNames.has(field);
  }

  fields(): string[] {
    return [...this.fieldNames];
  }
}
