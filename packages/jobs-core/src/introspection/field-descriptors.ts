import { z } from 'zod';
import type { ArgumentSchema } from '../job/job.types';

export type FieldType =
  | 'string'
  | 'integer'
  | 'number'
  | 'boolean'
  | 'date'
  | 'enum'
  | 'literal'
  | 'array'
  | 'record'
  | 'object'
  | 'union'
  | 'unknown';

export type FieldDescriptor = {
  name: string;
  type: FieldType;
  optional: boolean;
  nullable: boolean;
  hasDefault: boolean;
  /** Produces the declared default; `undefined` when there is none */
  defaultValue: () => unknown;
  schema: z.ZodTypeAny;
};

/**
 * Describe each declared field of an argument schema, in declaration order
 */
export function describeFields(schema: ArgumentSchema | undefined): FieldDescriptor[] {
  if (schema === undefined) return [];
  const shape: Record<string, z.ZodTypeAny> = schema.shape;
  return Object.entries(shape).map(([name, fieldSchema]) => describeField(name, fieldSchema));
}

export function describeField(name: string, fieldSchema: z.ZodTypeAny): FieldDescriptor {
  let current = fieldSchema;
  let optional = false;
  let nullable = false;
  let defaultValue: (() => unknown) | undefined;

  for (;;) {
    if (current instanceof z.ZodOptional) {
      optional = true;
      current = current.unwrap();
    } else if (current instanceof z.ZodNullable) {
      nullable = true;
      current = current.unwrap();
    } else if (current instanceof z.ZodDefault) {
      const producer: () => unknown = current._def.defaultValue;
      defaultValue ??= producer;
      current = current.removeDefault();
    } else if (current instanceof z.ZodEffects) {
      current = current.innerType();
    } else if (current instanceof z.ZodBranded || current instanceof z.ZodReadonly) {
      current = current.unwrap();
    } else {
      break;
    }
  }

  return {
    name,
    type: fieldTypeOf(current),
    optional,
    nullable,
    hasDefault: defaultValue !== undefined,
    defaultValue: defaultValue ?? (() => undefined),
    schema: fieldSchema
  };
}

function fieldTypeOf(schema: z.ZodTypeAny): FieldType {
  if (schema instanceof z.ZodString) return 'string';
  if (schema instanceof z.ZodNumber) return schema.isInt ? 'integer' : 'number';
  if (schema instanceof z.ZodBoolean) return 'boolean';
  if (schema instanceof z.ZodDate) return 'date';
  if (schema instanceof z.ZodEnum || schema instanceof z.ZodNativeEnum) return 'enum';
  if (schema instanceof z.ZodLiteral) return 'literal';
  if (schema instanceof z.ZodArray) return 'array';
  if (schema instanceof z.ZodRecord) return 'record';
  if (schema instanceof z.ZodObject) return 'object';
  if (schema instanceof z.ZodUnion || schema instanceof z.ZodDiscriminatedUnion) return 'union';
  return 'unknown';
}
