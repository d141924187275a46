import { z } from 'zod';
import { SerializationError } from '../errors';
import type { ArgumentSchema } from '../job/job.types';
import { describeValueType, isPlainObject } from '../utils';
import { formatZodIssues } from './zod-issues';

const NUMERIC_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const INTEGER_PATTERN = /^[+-]?\d+$/;
const EXPONENT_FORM = /^(-?)(\d)(?:\.(\d+))?e([+-]\d+)$/;

/**
 * Read typed arguments back from a wire payload.
 *
 * Transport through JSON loses type fidelity, so values are coerced toward
 * their declared types before zod parses them. Values already in canonical
 * form pass through unchanged.
 */
export function deserializeArguments(
  jobName: string,
  schema: ArgumentSchema | undefined,
  payload: unknown
) {
  if (schema === undefined) {
    return undefined;
  }

  if (!isPlainObject(payload)) {
    throw new SerializationError(
      `Failed to deserialize args for ${jobName}: expected payload object, got ${describeValueType(payload)}`,
      { jobName }
    );
  }

  const parser: z.ZodTypeAny = schema;
  const result = parser.safeParse(coerceValue(schema, payload));
  if (!result.success) {
    throw new SerializationError(
      `Failed to deserialize args for ${jobName}: ${formatZodIssues(result.error)}`,
      { jobName, cause: result.error }
    );
  }

  return result.data;
}

/**
 * Best-effort conversion of a wire value toward `schema`.
 * Never throws; values it cannot convert are left for zod to reject.
 */
export function coerceValue(schema: z.ZodTypeAny, value: unknown): unknown {
  if (schema instanceof z.ZodOptional) {
    return value === undefined ? value : coerceValue(schema.unwrap(), value);
  }
  if (schema instanceof z.ZodNullable) {
    return value === null ? value : coerceValue(schema.unwrap(), value);
  }
  if (schema instanceof z.ZodDefault) {
    return value === undefined ? value : coerceValue(schema.removeDefault(), value);
  }
  if (schema instanceof z.ZodEffects) {
    return coerceValue(schema.innerType(), value);
  }
  if (schema instanceof z.ZodBranded || schema instanceof z.ZodReadonly) {
    return coerceValue(schema.unwrap(), value);
  }
  if (schema instanceof z.ZodLazy) {
    return coerceValue(schema.schema, value);
  }

  if (schema instanceof z.ZodObject) {
    if (!isPlainObject(value)) return value;
    const shape: Record<string, z.ZodTypeAny> = schema.shape;
    const out: Record<string, unknown> = { ...value };
    for (const [key, fieldSchema] of Object.entries(shape)) {
      if (Object.hasOwn(value, key)) {
        out[key] = coerceValue(fieldSchema, value[key]);
      }
    }
    return out;
  }

  if (schema instanceof z.ZodArray) {
    if (!Array.isArray(value)) return value;
    const element: z.ZodTypeAny = schema.element;
    return value.map((item) => coerceValue(element, item));
  }

  if (schema instanceof z.ZodRecord) {
    if (!isPlainObject(value)) return value;
    const valueSchema: z.ZodTypeAny = schema.valueSchema;
    return Object.fromEntries(
      Object.entries(value).map(([key, entry]) => [key, coerceValue(valueSchema, entry)])
    );
  }

  if (schema instanceof z.ZodUnion || schema instanceof z.ZodDiscriminatedUnion) {
    const options: readonly z.ZodTypeAny[] = schema.options;
    for (const option of options) {
      const candidate = coerceValue(option, value);
      if (option.safeParse(candidate).success) return candidate;
    }
    return value;
  }

  if (schema instanceof z.ZodTuple) {
    if (!Array.isArray(value)) return value;
    const items: z.ZodTypeAny[] = schema.items;
    const rest: z.ZodTypeAny | null = schema._def.rest;
    return value.map((item, index) => {
      const itemSchema = items[index] ?? rest;
      return itemSchema ? coerceValue(itemSchema, item) : item;
    });
  }

  if (schema instanceof z.ZodIntersection) {
    const left: z.ZodTypeAny = schema._def.left;
    const right: z.ZodTypeAny = schema._def.right;
    return coerceValue(right, coerceValue(left, value));
  }

  if (schema instanceof z.ZodBoolean) return toBoolean(value);
  if (schema instanceof z.ZodNumber) return toNumber(value);
  if (schema instanceof z.ZodString) return toText(value);
  if (schema instanceof z.ZodDate) return toDate(value);

  if (schema instanceof z.ZodNativeEnum || schema instanceof z.ZodLiteral) {
    return toAtom(schema, value);
  }

  return value;
}

function toBoolean(value: unknown): unknown {
  if (value === 'true') return true;
  if (value === 'false') return false;
  return value;
}

/**
 * Integer text beyond the safe integer range stays a string, so zod rejects
 * it instead of the job receiving a rounded value
 */
function toNumber(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  const text = value.trim();
  if (!NUMERIC_PATTERN.test(text)) return value;

  const parsed = Number(text);
  if (INTEGER_PATTERN.test(text) && !Number.isSafeInteger(parsed)) return value;
  return parsed;
}

function toText(value: unknown): unknown {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return toPlainDecimal(value);
  }
  return value;
}

/**
 * Shortest round-trip digits of `n`, written without exponent notation
 */
export function toPlainDecimal(n: number): string {
  const text = String(n);
  const match = EXPONENT_FORM.exec(text);
  if (match === null) return text;

  const [, sign, lead, fraction = '', exponentText] = match;
  const digits = lead + fraction;
  const point = 1 + Number(exponentText);

  if (point <= 0) return `${sign}0.${'0'.repeat(-point)}${digits}`;
  if (point >= digits.length) return `${sign}${digits}${'0'.repeat(point - digits.length)}`;
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}

function toDate(value: unknown): unknown {
  if (typeof value === 'string' || typeof value === 'number') {
    const date = new Date(value);
    return Number.isNaN(date.getTime()) ? value : date;
  }
  return value;
}

/**
 * Strings arrive for numeric and boolean enum members and literals
 */
function toAtom(schema: z.ZodTypeAny, value: unknown): unknown {
  if (schema.safeParse(value).success) return value;
  for (const candidate of [toNumber(value), toBoolean(value)]) {
    if (candidate !== value && schema.safeParse(candidate).success) return candidate;
  }
  return value;
}
