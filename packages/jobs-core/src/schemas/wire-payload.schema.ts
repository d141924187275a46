import { z } from 'zod';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

/**
 * Any value that survives a JSON round trip unchanged
 */
export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema)
  ])
);

/**
 * Wire payload - string-keyed job arguments as the broker stores them
 */
export const wirePayloadSchema = z.record(jsonValueSchema).describe('Serialized job arguments');

export type WirePayload = z.infer<typeof wirePayloadSchema>;
