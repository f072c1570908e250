/**
 * Field builders shared by the record schemas.
 */

import { z } from "zod";

/**
 * Optional field that also accepts null on the wire.
 * null and undefined both parse to "absent".
 */
export function optional<T extends z.ZodTypeAny>(schema: T) {
  return schema
    .nullish()
    .transform((value): z.output<T> | undefined => value ?? undefined);
}

/**
 * Plain integer. Priority, importance and severity ranges are advisory
 * only (see advisories.ts), so no bounds here.
 */
export const integer = () => z.number().int();

/**
 * Confidence score, conceptually 0.0 to 1.0. Only finiteness is enforced.
 */
export const confidence = () => z.number().finite();

/** List of free-text entries (evidence, implications, queries...) */
export const textList = () => z.array(z.string());

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Any value that survives JSON.stringify / JSON.parse unchanged.
 * Functions, Dates, Maps, undefined and non-finite numbers are rejected.
 */
export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(z.string(), JsonValueSchema),
  ])
);

/** Opaque producer-owned map with JSON values */
export const jsonObject = () => z.record(z.string(), JsonValueSchema);
