import { z } from 'zod';
import { SchemaNotDefinedError } from '../errors';
import type { ArgumentSchema } from '../job/job.types';
import { describeValueType } from '../utils';

export type SchemaDeclaration = {
  readonly name: string;
  readonly args?: unknown;
};

/**
 * Resolves and caches the argument schema of each job definition.
 *
 * Entries are keyed by definition identity and written at most once per
 * definition; two first callers racing compute the same value, so the
 * second write is harmless.
 */
export class SchemaRegistry {
  private readonly cache = new WeakMap<SchemaDeclaration, ArgumentSchema | null>();

  resolve(definition: SchemaDeclaration): ArgumentSchema | undefined {
    const cached = this.cache.get(definition);
    if (cached !== undefined) {
      return cached ?? undefined;
    }

    const schema = this.validate(definition);
    this.cache.set(definition, schema ?? null);
    return schema;
  }

  has(definition: SchemaDeclaration): boolean {
    return this.cache.has(definition);
  }

  private validate(definition: SchemaDeclaration): ArgumentSchema | undefined {
    const { args } = definition;
    if (args === undefined) {
      return undefined;
    }

    if (!(args instanceof z.ZodObject)) {
      throw new SchemaNotDefinedError(
        `${definition.name}.args must be a zod object schema, got ${describeValueType(args)}`,
        { jobName: definition.name }
      );
    }

    return args;
  }
}

export const defaultSchemaRegistry = new SchemaRegistry();
