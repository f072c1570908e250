/**
 * Record codecs: construct, serialize and deserialize one record type.
 *
 * Every record of the research pipeline goes through the same contract:
 *
 *   create(fields)     validate + deep freeze         -> Readonly<T>
 *   toJSON(record)     canonical JSON object          -> Record<string, unknown>
 *   serialize(record)  canonical JSON text            -> string
 *   fromJSON(value)    inverse of toJSON               -> Readonly<T>
 *   parse(text)        inverse of serialize            -> Readonly<T>
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * SERIALIZATION POLICY
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * - Field names are preserved verbatim (mixed snake_case / camelCase).
 * - Absent optional fields are omitted, never written as null.
 * - null on an optional field is read back as "absent", since producers on
 *   the other side of the boundary write absent optionals as null.
 * - Unknown fields are ignored unless { strict: true } is passed, in which
 *   case each one is reported as an "unrecognized_keys" issue.
 *
 * Round-trip law: fromJSON(toJSON(create(x))) deep-equals create(x).
 */

import type { z } from "zod";
import {
  ValidationError,
  toValidationIssues,
  type ValidationIssue,
} from "./errors.js";

export interface ParseOptions {
  /** Reject fields the schema does not know about (default: false) */
  strict?: boolean;
}

export type SafeCreateResult<T> =
  | { success: true; record: Readonly<T> }
  | { success: false; error: ValidationError };

export interface RecordCodec<T> {
  /** Record type name, used in error messages and the CLI registry */
  readonly name: string;
  readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  create(fields: unknown, options?: ParseOptions): Readonly<T>;
  safeCreate(fields: unknown, options?: ParseOptions): SafeCreateResult<T>;
  fromJSON(value: unknown, options?: ParseOptions): Readonly<T>;
  parse(text: string, options?: ParseOptions): Readonly<T>;
  toJSON(record: T): Record<string, unknown>;
  serialize(record: T, pretty?: boolean): string;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Copy plain objects and arrays, dropping undefined-valued keys.
 * Anything else (strings, numbers, class instances) is returned as is.
 */
function toPlain(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(toPlain);
  }
  if (isPlainObject(value)) {
    const copy: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      if (entry !== undefined) {
        copy[key] = toPlain(entry);
      }
    }
    return copy;
  }
  return value;
}

/**
 * Drop undefined-valued keys in place, then deep freeze.
 * Only plain objects and arrays are touched.
 */
function pruneAndFreeze<T>(value: T): T {
  if (Array.isArray(value)) {
    for (const entry of value) {
      pruneAndFreeze(entry);
    }
    Object.freeze(value);
  } else if (isPlainObject(value)) {
    for (const [key, entry] of Object.entries(value)) {
      if (entry === undefined) {
        Reflect.deleteProperty(value, key);
      } else {
        pruneAndFreeze(entry);
      }
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Walk the raw input alongside the parsed output and report every input key
 * the schema dropped. Zod keeps a key in its output whenever the key was
 * present in the input, so a missing own key means the schema does not
 * know it. Inherited names (constructor, toString) do not count.
 */
function collectUnknownKeys(
  input: unknown,
  output: unknown,
  path: (string | number)[],
  issues: ValidationIssue[]
): void {
  if (Array.isArray(input) && Array.isArray(output)) {
    const length = Math.min(input.length, output.length);
    for (let i = 0; i < length; i++) {
      collectUnknownKeys(input[i], output[i], [...path, i], issues);
    }
    return;
  }

  if (isPlainObject(input) && isPlainObject(output)) {
    for (const key of Object.keys(input)) {
      if (!Object.hasOwn(output, key)) {
        issues.push({
          path: [...path, key],
          message: `Unrecognized key: "${key}"`,
          code: "unrecognized_keys",
        });
        continue;
      }
      collectUnknownKeys(input[key], output[key], [...path, key], issues);
    }
  }
}

/**
 * Build the codec for one record type.
 */
export function defineRecord<T>(
  name: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): RecordCodec<T> {
  function validate(fields: unknown, options: ParseOptions): T {
    const result = schema.safeParse(fields);
    if (!result.success) {
      throw new ValidationError(name, toValidationIssues(result.error.issues));
    }

    if (options.strict) {
      const unknownKeys: ValidationIssue[] = [];
      collectUnknownKeys(fields, result.data, [], unknownKeys);
      if (unknownKeys.length > 0) {
        throw new ValidationError(name, unknownKeys);
      }
    }

    return result.data;
  }

  function create(fields: unknown, options: ParseOptions = {}): Readonly<T> {
    // Opaque maps in the Zod output still share references with the
    // caller's input, so freeze a clone.
    return pruneAndFreeze(structuredClone(validate(fields, options)));
  }

  function parse(text: string, options: ParseOptions = {}): Readonly<T> {
    let decoded: unknown;
    try {
      decoded = JSON.parse(text);
    } catch (err) {
      throw new ValidationError(name, [
        {
          path: [],
          message: `Failed to parse JSON: ${err instanceof Error ? err.message : String(err)}`,
          code: "invalid_json",
        },
      ]);
    }
    return create(decoded, options);
  }

  function toJSON(record: T): Record<string, unknown> {
    const plain = toPlain(validate(record, {}));
    if (!isPlainObject(plain)) {
      throw new ValidationError(name, [
        { path: [], message: "Expected a JSON object", code: "invalid_type" },
      ]);
    }
    return plain;
  }

  return {
    name,
    schema,
    create,
    safeCreate(fields, options) {
      try {
        return { success: true, record: create(fields, options) };
      } catch (err) {
        if (err instanceof ValidationError) {
          return { success: false, error: err };
        }
        throw err;
      }
    },
    fromJSON: create,
    parse,
    toJSON,
    serialize(record, pretty = false) {
      return JSON.stringify(toJSON(record), null, pretty ? 2 : undefined);
    },
  };
}
