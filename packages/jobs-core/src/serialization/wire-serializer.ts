import { z } from 'zod';
import { SerializationError } from '../errors';
import type { ArgumentSchema } from '../job/job.types';
import type { JsonValue, WirePayload } from '../schemas';
import { describeValueType, isPlainObject } from '../utils';

/**
 * Thrown inside the walker; always surfaces as a SerializationError
 */
class WireFormatIssue extends Error {
  constructor(path: readonly string[], detail: string) {
    super(path.length > 0 ? `${path.join('.')}: ${detail}` : detail);
  }
}

const UNSUPPORTED_TYPES = [
  z.ZodFunction,
  z.ZodSymbol,
  z.ZodBigInt,
  z.ZodMap,
  z.ZodSet,
  z.ZodPromise,
  z.ZodUndefined,
  z.ZodVoid,
  z.ZodNever
];

/**
 * Serialize typed arguments into a string-keyed, JSON-safe payload.
 *
 * Values are written structurally along the schema (nested objects, arrays
 * and records included). Nothing is coerced: arguments were strictly
 * validated when they were built.
 */
export function serializeArguments(
  jobName: string,
  schema: ArgumentSchema | undefined,
  args: unknown
): WirePayload {
  if (args === undefined) {
    return {};
  }

  try {
    if (!(schema instanceof z.ZodObject)) {
      throw new WireFormatIssue([], `expected a zod object schema, got ${describeValueType(schema)}`);
    }
    const payload = writeValue(schema, args, []);
    if (!isPlainObject(payload)) {
      throw new WireFormatIssue([], `expected arguments object, got ${describeValueType(args)}`);
    }
    return payload;
  } catch (error) {
    const cause = error instanceof Error ? error.message : String(error);
    throw new SerializationError(`Failed to serialize args for ${jobName}: ${cause}`, {
      jobName,
      cause: error
    });
  }
}

function writeValue(schema: z.ZodTypeAny, value: unknown, path: string[]): JsonValue | undefined {
  if (UNSUPPORTED_TYPES.some((type) => schema instanceof type)) {
    throw new WireFormatIssue(path, `unsupported field type ${describeValueType(schema)}`);
  }

  if (schema instanceof z.ZodOptional) {
    return value === undefined ? undefined : writeValue(schema.unwrap(), value, path);
  }
  if (schema instanceof z.ZodNullable) {
    return value === null ? null : writeValue(schema.unwrap(), value, path);
  }
  if (schema instanceof z.ZodDefault) {
    return value === undefined ? undefined : writeValue(schema.removeDefault(), value, path);
  }
  if (schema instanceof z.ZodEffects) {
    return writeValue(schema.innerType(), value, path);
  }
  if (schema instanceof z.ZodBranded || schema instanceof z.ZodReadonly) {
    return writeValue(schema.unwrap(), value, path);
  }
  if (schema instanceof z.ZodLazy) {
    return writeValue(schema.schema, value, path);
  }

  if (schema instanceof z.ZodObject) {
    if (!isPlainObject(value)) {
      throw new WireFormatIssue(path, `expected object, got ${describeValueType(value)}`);
    }
    const shape: Record<string, z.ZodTypeAny> = schema.shape;
    const out: Record<string, JsonValue> = {};
    for (const [key, fieldSchema] of Object.entries(shape)) {
      const written = writeValue(fieldSchema, value[key], [...path, key]);
      if (written !== undefined) {
        out[String(key)] = written;
      }
    }
    return out;
  }

  if (schema instanceof z.ZodArray) {
    if (!Array.isArray(value)) {
      throw new WireFormatIssue(path, `expected array, got ${describeValueType(value)}`);
    }
    const element: z.ZodTypeAny = schema.element;
    return value.map((item, index) => writeValue(element, item, [...path, String(index)]) ?? null);
  }

  if (schema instanceof z.ZodRecord) {
    if (!isPlainObject(value)) {
      throw new WireFormatIssue(path, `expected object, got ${describeValueType(value)}`);
    }
    const valueSchema: z.ZodTypeAny = schema.valueSchema;
    const out: Record<string, JsonValue> = {};
    for (const [key, entry] of Object.entries(value)) {
      const written = writeValue(valueSchema, entry, [...path, key]);
      if (written !== undefined) {
        out[String(key)] = written;
      }
    }
    return out;
  }

  if (schema instanceof z.ZodDate) {
    if (!(value instanceof Date) || Number.isNaN(value.getTime())) {
      throw new WireFormatIssue(path, `expected valid Date, got ${describeValueType(value)}`);
    }
    return value.toISOString();
  }

  return toJsonValue(value, path);
}

/**
 * Structural conversion for values whose schema gives no shape (unions, unknown, any)
 */
function toJsonValue(value: unknown, path: string[]): JsonValue | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new WireFormatIssue(path, `cannot serialize non-finite number ${value}`);
    }
    return value;
  }
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new WireFormatIssue(path, 'cannot serialize invalid Date');
    }
    return value.toISOString();
  }
  if (Array.isArray(value)) {
    return value.map((item, index) => toJsonValue(item, [...path, String(index)]) ?? null);
  }
  if (isPlainObject(value)) {
    const out: Record<string, JsonValue> = {};
    for (const [key, entry] of Object.entries(value)) {
      const written = toJsonValue(entry, [...path, key]);
      if (written !== undefined) {
        out[String(key)] = written;
      }
    }
    return out;
  }
  throw new WireFormatIssue(path, `cannot serialize value of type ${describeValueType(value)}`);
}
