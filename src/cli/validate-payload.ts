#!/usr/bin/env node
/**
 * CLI command to validate research pipeline payloads.
 *
 * Validates either:
 * - a JSON document against one record type (a single object, or an array
 *   of objects of that type), or
 * - an NDJSON stream of StreamUpdate messages (--stream).
 *
 * Reports:
 * - Validation errors per item / line
 * - Advisory warnings (out-of-range priorities, confidences, ...)
 * - Duplicate step ids (StepInfo arrays)
 * - Stream event kinds and the size of the replayed consumer view
 *
 * Usage:
 *   node --import tsx src/cli/validate-payload.ts --type ResearchPlan plan.json
 *   node --import tsx src/cli/validate-payload.ts --stream updates.ndjson
 *   npm run validate-payload -- --type StepInfo steps.json --json
 *
 * Options:
 *   --type <Record>   Record type of the document (see --help for the list)
 *   --stream          Treat the file as NDJSON StreamUpdate messages
 *   --strict          Reject fields the schema does not know about
 *                     (default: SCHEMA_STRICT_PARSING)
 *   --json            Output the report as JSON (for CI parsing)
 *   --verbose         Show warnings and event breakdown
 *   -h, --help        Show help
 *
 * Exit codes:
 *   0 - Payload is valid (warnings allowed)
 *   1 - Validation failed, or bad arguments
 */

import { existsSync, readFileSync, realpathSync } from "node:fs";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { parseArgs } from "node:util";

import {
  RECORD_NAMES,
  RECORD_TYPES,
  ValidationError,
  collectAdvisories,
  findDuplicateStepIds,
  formatPath,
  isRecordName,
  type RecordCodec,
  type RecordName,
  type RecordTypeMap,
  type StreamUpdate,
} from "../schemas/index.js";
import {
  decodeStreamUpdates,
  replayStreamUpdates,
  toStreamEvent,
  type StreamEventKind,
} from "../stream/index.js";
import { getConfig, ConfigError } from "../config/index.js";
import { createLogger, initRunId, type Logger } from "../logging/index.js";

// ============================================================
// Types
// ============================================================

export interface ReportIssue {
  /** "document", "item 3" or "line 7" */
  location: string;
  /** Dotted field path, "(root)" for the whole item */
  path: string;
  message: string;
  code: string;
}

export interface PayloadReport {
  runId: string;
  mode: "record" | "stream";
  recordName: RecordName;
  strict: boolean;
  /** Records (record mode) or non-blank lines (stream mode) checked */
  checked: number;
  passed: number;
  errors: ReportIssue[];
  warnings: ReportIssue[];
  /** Stream mode: count of valid events per variant kind */
  eventKinds?: Partial<Record<StreamEventKind, number>>;
  /** Stream mode: entries left after replaying overwrite semantics */
  replayedEntries?: number;
  success: boolean;
}

export interface ValidatePayloadOptions {
  /** Record type for record mode (ignored with stream: true) */
  recordName?: RecordName;
  stream?: boolean;
  strict?: boolean;
  runId?: string;
}

interface Item {
  location: string;
  value: unknown;
}

// ============================================================
// Validation
// ============================================================

function issuesOf(location: string, error: ValidationError): ReportIssue[] {
  return error.issues.map((issue) => ({
    location,
    path: formatPath(issue.path),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Validate each item against one record type, collecting errors and
 * advisories. Returns the records that passed.
 */
function checkRecords<K extends RecordName>(
  name: K,
  items: Item[],
  strict: boolean,
  report: PayloadReport
): Readonly<RecordTypeMap[K]>[] {
  const codec: RecordCodec<RecordTypeMap[K]> = RECORD_TYPES[name];
  const records: Readonly<RecordTypeMap[K]>[] = [];

  for (const item of items) {
    const result = codec.safeCreate(item.value, { strict });
    if (!result.success) {
      report.errors.push(...issuesOf(item.location, result.error));
      continue;
    }
    records.push(result.record);
    for (const advisory of collectAdvisories(name, result.record)) {
      report.warnings.push({
        location: item.location,
        path: advisory.path,
        message: advisory.message,
        code: "advisory_range",
      });
    }
  }

  return records;
}

function validateRecordDocument(text: string, name: RecordName, report: PayloadReport): void {
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (err) {
    report.errors.push({
      location: "document",
      path: "(root)",
      message: `Failed to parse JSON: ${err instanceof Error ? err.message : String(err)}`,
      code: "invalid_json",
    });
    return;
  }

  const items: Item[] = Array.isArray(document)
    ? document.map((value: unknown, index) => ({ location: `item ${index}`, value }))
    : [{ location: "document", value: document }];

  report.checked = items.length;

  if (name === "StepInfo") {
    const steps = checkRecords("StepInfo", items, report.strict, report);
    report.passed = steps.length;
    for (const duplicate of findDuplicateStepIds(steps)) {
      report.warnings.push({
        location: `item ${duplicate.duplicateIndex}`,
        path: "id",
        message: `Duplicate step id "${duplicate.id}" (first seen at item ${duplicate.firstIndex})`,
        code: "duplicate_id",
      });
    }
    return;
  }

  report.passed = checkRecords(name, items, report.strict, report).length;
}

function validateStream(text: string, report: PayloadReport): void {
  const lines = decodeStreamUpdates(text, { strict: report.strict });
  const valid: Readonly<StreamUpdate>[] = [];
  const kinds: Partial<Record<StreamEventKind, number>> = {};

  for (const result of lines) {
    const location = `line ${result.line}`;
    if ("error" in result) {
      report.errors.push(...issuesOf(location, result.error));
      continue;
    }

    let kind: StreamEventKind;
    try {
      kind = toStreamEvent(result.update.data).kind;
    } catch (err) {
      if (!(err instanceof ValidationError)) {
        throw err;
      }
      report.errors.push(
        ...issuesOf(location, err).map((issue) => ({ ...issue, path: `data.${issue.path}` }))
      );
      continue;
    }

    kinds[kind] = (kinds[kind] ?? 0) + 1;
    valid.push(result.update);
    for (const advisory of collectAdvisories("StreamUpdate", result.update)) {
      report.warnings.push({
        location,
        path: advisory.path,
        message: advisory.message,
        code: "advisory_range",
      });
    }
  }

  report.checked = lines.length;
  report.passed = valid.length;
  report.eventKinds = kinds;
  report.replayedEntries = replayStreamUpdates(valid).length;
}

/**
 * Validate a payload text and build the report. Pure: no I/O, no exit.
 */
export function validatePayload(text: string, options: ValidatePayloadOptions): PayloadReport {
  const stream = options.stream ?? false;
  const recordName: RecordName = stream ? "StreamUpdate" : options.recordName ?? "StreamUpdate";

  const report: PayloadReport = {
    runId: options.runId ?? "no-run-id",
    mode: stream ? "stream" : "record",
    recordName,
    strict: options.strict ?? false,
    checked: 0,
    passed: 0,
    errors: [],
    warnings: [],
    success: false,
  };

  if (stream) {
    validateStream(text, report);
  } else {
    validateRecordDocument(text, recordName, report);
  }

  report.success = report.errors.length === 0;
  return report;
}

// ============================================================
// Output Formatting
// ============================================================

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
};

const useColors = process.stdout.isTTY && !process.env.NO_COLOR;

function c(color: keyof typeof COLORS, text: string): string {
  return useColors ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

function formatIssue(issue: ReportIssue): string {
  return `[${issue.location}] ${issue.path}: ${issue.message}`;
}

/**
 * Human-readable report, one line per entry.
 */
export function formatReport(report: PayloadReport, verbose: boolean): string {
  const lines: string[] = [];
  const target = report.mode === "stream" ? "StreamUpdate stream" : report.recordName;

  lines.push(c("bold", "═".repeat(60)));
  lines.push(c("bold", ` Payload Validation: ${target}`));
  lines.push(c("bold", "═".repeat(60)));
  lines.push(`Run: ${report.runId}${report.strict ? " (strict)" : ""}`);
  lines.push(`Checked: ${report.checked}, passed: ${report.passed}`);

  for (const issue of report.errors) {
    lines.push(`${c("red", "✗")} ${formatIssue(issue)}`);
  }

  if (verbose) {
    for (const issue of report.warnings) {
      lines.push(`${c("yellow", "!")} ${formatIssue(issue)}`);
    }
    if (report.eventKinds) {
      const breakdown = Object.entries(report.eventKinds)
        .map(([kind, count]) => `${kind}=${count}`)
        .join(", ");
      lines.push(c("dim", `Events: ${breakdown || "none"}`));
    }
    if (report.replayedEntries !== undefined) {
      lines.push(c("dim", `Replayed entries: ${report.replayedEntries}`));
    }
  } else if (report.warnings.length > 0) {
    lines.push(c("yellow", `${report.warnings.length} warning(s), use --verbose to list them`));
  }

  lines.push("─".repeat(60));
  lines.push(
    report.success
      ? c("green", `✓ Payload is valid (${report.passed}/${report.checked})`)
      : c("red", `✗ Validation failed: ${report.errors.length} error(s)`)
  );

  return lines.join("\n");
}

// ============================================================
// CLI
// ============================================================

const HELP = `
Usage: validate-payload [options] <file>

Options:
  --type <Record>   Record type of the document
  --stream          Treat the file as NDJSON StreamUpdate messages
  --strict          Reject unknown fields (default: SCHEMA_STRICT_PARSING)
  --json            Output the report as JSON
  --verbose         Show warnings and event breakdown
  -h, --help        Show this help message

Record types:
  ${RECORD_NAMES.join(", ")}
`;

function parseCliArgs() {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      type: { type: "string" },
      stream: { type: "boolean", default: false },
      strict: { type: "boolean" },
      json: { type: "boolean", default: false },
      verbose: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  return { values, positionals };
}

function fail(logger: Logger, message: string): never {
  logger.error(message);
  console.error(HELP);
  process.exit(1);
}

async function main(): Promise<void> {
  const { values, positionals } = parseCliArgs();

  if (values.help) {
    console.log(HELP);
    process.exit(0);
  }

  const config = getConfig();
  const runId = initRunId(process.env.RUN_ID);
  const logger = createLogger({
    level: config.logLevel,
    console: !values.json,
    file: config.logToFile,
    logDir: config.logDir,
    logFile: `${config.appName}.log`,
  }).child({ command: "validate-payload" });

  const file = positionals[0];
  if (file === undefined) {
    fail(logger, "Missing payload file argument");
  }

  let recordName: RecordName | undefined;
  if (!values.stream) {
    if (values.type === undefined || !isRecordName(values.type)) {
      fail(logger, `Unknown or missing --type: ${values.type ?? "(none)"}`);
    }
    recordName = values.type;
  }

  const path = resolve(file);
  logger.debug("Reading payload", { path });
  const text = readFileSync(path, "utf-8");

  const report = validatePayload(text, {
    recordName,
    stream: values.stream,
    strict: values.strict ?? config.strictParsing,
    runId,
  });

  logger.info("Validation finished", {
    path,
    checked: report.checked,
    errors: report.errors.length,
    warnings: report.warnings.length,
  });

  if (values.json) {
    console.log(JSON.stringify(report, null, 2));
  } else {
    console.log(formatReport(report, values.verbose));
  }

  process.exit(report.success ? 0 : 1);
}

/**
 * True when the script path node was started with resolves to this module.
 * Symlinks are followed, so the npm bin link (no extension) counts.
 */
export function isEntryPoint(scriptPath: string | undefined, moduleUrl: string): boolean {
  if (scriptPath === undefined || !existsSync(scriptPath)) {
    return false;
  }
  return realpathSync(scriptPath) === realpathSync(fileURLToPath(moduleUrl));
}

// Only run when executed directly (not imported by tests)
if (isEntryPoint(process.argv[1], import.meta.url)) {
  main().catch((err: unknown) => {
    if (err instanceof ConfigError) {
      console.error(c("red", `Configuration error: ${err.message}`));
    } else {
      const message = err instanceof Error ? err.message : String(err);
      console.error(c("red", `Error: ${message}`));
    }
    process.exit(1);
  });
}
