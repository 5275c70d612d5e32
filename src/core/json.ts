import { z } from 'zod';
import type { JsonObject, JsonValue } from './types.js';

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema)
  ])
);

export const jsonObjectSchema: z.ZodType<JsonObject> = z.record(jsonValueSchema);

export function isJsonObject(value: JsonValue): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Drops anything JSON cannot carry (undefined, functions) and validates the rest. */
export function toJsonObject(value: unknown): JsonObject | undefined {
  if (value === undefined) return undefined;
  const parsed = jsonObjectSchema.safeParse(JSON.parse(JSON.stringify(value)));
  return parsed.success ? parsed.data : undefined;
}
