/**
 * Newline-delimited JSON framing of StreamUpdate messages, and the consumer
 * side replay of overwrite semantics.
 */

import {
  StreamUpdateRecord,
  ValidationError,
  type ParseOptions,
  type StreamUpdate,
  type StreamUpdateData,
} from "../schemas/index.js";

/**
 * Encode one update as a single NDJSON line (trailing newline included).
 */
export function encodeStreamUpdate(update: StreamUpdate): string {
  return `${StreamUpdateRecord.serialize(update)}\n`;
}

export type StreamLineResult =
  | { line: number; update: Readonly<StreamUpdate> }
  | { line: number; error: ValidationError };

/**
 * Decode an NDJSON body. Blank lines are skipped; every other line yields
 * either a validated update or the error for that line (1-based numbers).
 */
export function decodeStreamUpdates(text: string, options: ParseOptions = {}): StreamLineResult[] {
  const results: StreamLineResult[] = [];

  text.split(/\r?\n/).forEach((raw, index) => {
    if (raw.trim() === "") {
      return;
    }
    const line = index + 1;
    try {
      results.push({ line, update: StreamUpdateRecord.parse(raw, options) });
    } catch (err) {
      if (!(err instanceof ValidationError)) {
        throw err;
      }
      results.push({ line, error: err });
    }
  });

  return results;
}

/**
 * Replay updates in arrival order into the list a consumer would display.
 * An update with overwrite=true replaces the earlier entry sharing its id,
 * in place; anything else is appended.
 */
export function replayStreamUpdates(
  updates: readonly StreamUpdate[]
): Readonly<StreamUpdateData>[] {
  const entries: Readonly<StreamUpdateData>[] = [];
  const positions = new Map<string, number>();

  for (const { data } of updates) {
    const position = positions.get(data.id);
    if (data.overwrite && position !== undefined) {
      entries[position] = data;
      continue;
    }
    positions.set(data.id, entries.length);
    entries.push(data);
  }

  return entries;
}
