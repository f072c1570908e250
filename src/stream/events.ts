/**
 * Typed variant view of streaming updates.
 *
 * On the wire StreamUpdateData is one flat object whose optional fields
 * depend on (type, status). Inside the process we work with StreamEvent,
 * a discriminated union where every variant carries exactly the fields
 * that apply to it:
 *
 *   kind           status      fields
 *   ─────────────  ──────────  ─────────────────────────────────────────
 *   plan           running     -
 *   plan           completed   plan, totalSteps
 *   search         running     source, query
 *   search         completed   source, query, results
 *   analysis       running     analysisType
 *   analysis       completed   analysisType, findings
 *   gap-analysis   running     -
 *   gap-analysis   completed   findings, gaps, recommendations
 *   synthesis      running     -
 *   synthesis      completed   findings, uncertainties
 *   progress       any         completedSteps, isComplete, totalSteps?
 *   error          any         - (detail in message)
 *   custom         any         type + every optional field, passed through
 *
 * toStreamEvent() and fromStreamEvent() convert between the two shapes.
 * Wire-level fields that do not apply to a variant are dropped.
 */

import {
  AnalysisKind,
  SearchSource,
  StreamStepType,
  StreamUpdateDataRecord,
  ValidationError,
  type KnowledgeGap,
  type RecommendedFollowup,
  type ResearchPlan,
  type SearchResultItem,
  type StreamFinding,
  type StreamStatus,
  type StreamUpdateData,
  type StreamUpdateDataInput,
  type ValidationIssue,
} from "../schemas/index.js";

interface StreamEventBase {
  id: string;
  title: string;
  message: string;
  timestamp: number;
  overwrite: boolean;
}

export type PlanEvent = StreamEventBase & { kind: "plan" } & (
    | { status: "running" }
    | { status: "completed"; plan: ResearchPlan; totalSteps: number }
  );

export type SearchEvent = StreamEventBase & { kind: "search"; source: SearchSource; query: string } & (
    | { status: "running" }
    | { status: "completed"; results: SearchResultItem[] }
  );

export type AnalysisEvent = StreamEventBase & { kind: "analysis"; analysisType: string } & (
    | { status: "running" }
    | { status: "completed"; findings: StreamFinding[] }
  );

export type GapAnalysisEvent = StreamEventBase & { kind: "gap-analysis" } & (
    | { status: "running" }
    | {
        status: "completed";
        findings: StreamFinding[];
        gaps: KnowledgeGap[];
        recommendations: RecommendedFollowup[];
      }
  );

export type SynthesisEvent = StreamEventBase & { kind: "synthesis" } & (
    | { status: "running" }
    | { status: "completed"; findings: StreamFinding[]; uncertainties: string[] }
  );

export type ProgressEvent = StreamEventBase & {
  kind: "progress";
  status: StreamStatus;
  completedSteps: number;
  isComplete: boolean;
  totalSteps?: number;
};

export type ErrorEvent = StreamEventBase & { kind: "error"; status: StreamStatus };

type OptionalStreamFields = Omit<
  StreamUpdateData,
  "id" | "type" | "status" | "title" | "message" | "timestamp" | "overwrite"
>;

export type CustomEvent = StreamEventBase & {
  kind: "custom";
  type: string;
  status: StreamStatus;
  fields: OptionalStreamFields;
};

export type StreamEvent =
  | PlanEvent
  | SearchEvent
  | AnalysisEvent
  | GapAnalysisEvent
  | SynthesisEvent
  | ProgressEvent
  | ErrorEvent
  | CustomEvent;

export type StreamEventKind = StreamEvent["kind"];

/**
 * Collects the fields a variant requires and reports the missing ones.
 */
class VariantFields {
  readonly issues: ValidationIssue[] = [];

  constructor(
    private readonly data: StreamUpdateData,
    private readonly variant: string
  ) {}

  require<K extends keyof OptionalStreamFields>(key: K): StreamUpdateData[K] {
    const value = this.data[key];
    if (value === undefined) {
      this.issues.push({
        path: [key],
        message: `Required for ${this.variant} updates`,
        code: "invalid_type",
      });
    }
    return value;
  }

  fail(): ValidationError {
    return new ValidationError("StreamEvent", this.issues);
  }
}

/**
 * Classify a flat wire payload into its typed variant.
 *
 * @throws ValidationError if the payload lacks a field its variant requires
 */
export function toStreamEvent(data: StreamUpdateData): StreamEvent {
  const base: StreamEventBase = {
    id: data.id,
    title: data.title,
    message: data.message,
    timestamp: data.timestamp,
    overwrite: data.overwrite,
  };
  const known = StreamStepType.safeParse(data.type);

  if (!known.success) {
    const { id, type, status, title, message, timestamp, overwrite, ...extra } = data;
    return { ...base, kind: "custom", type, status, fields: extra };
  }

  const stepType = known.data;
  const fields = new VariantFields(data, `${data.status} ${stepType}`);

  switch (stepType) {
    case "plan": {
      if (data.status === "running") {
        return { ...base, kind: "plan", status: "running" };
      }
      const plan = fields.require("plan");
      const totalSteps = fields.require("totalSteps");
      if (plan === undefined || totalSteps === undefined) throw fields.fail();
      return { ...base, kind: "plan", status: "completed", plan, totalSteps };
    }

    case "web":
    case "academic":
    case "x": {
      const query = fields.require("query");
      if (data.status === "running") {
        if (query === undefined) throw fields.fail();
        return { ...base, kind: "search", source: stepType, status: "running", query };
      }
      const results = fields.require("results");
      if (query === undefined || results === undefined) throw fields.fail();
      return { ...base, kind: "search", source: stepType, status: "completed", query, results };
    }

    case "analysis":
      return toAnalysisEvent(base, data, fields);

    case "progress": {
      const completedSteps = fields.require("completedSteps");
      const isComplete = fields.require("isComplete");
      if (completedSteps === undefined || isComplete === undefined) throw fields.fail();
      return {
        ...base,
        kind: "progress",
        status: data.status,
        completedSteps,
        isComplete,
        ...(data.totalSteps !== undefined ? { totalSteps: data.totalSteps } : {}),
      };
    }

    case "error":
      return { ...base, kind: "error", status: data.status };
  }
}

function toAnalysisEvent(
  base: StreamEventBase,
  data: StreamUpdateData,
  fields: VariantFields
): StreamEvent {
  const analysisType = fields.require("analysisType");
  if (analysisType === undefined) throw fields.fail();

  const kind = AnalysisKind.safeParse(analysisType);

  if (kind.success && kind.data === "gaps") {
    if (data.status === "running") {
      return { ...base, kind: "gap-analysis", status: "running" };
    }
    const findings = fields.require("findings");
    const gaps = fields.require("gaps");
    const recommendations = fields.require("recommendations");
    if (findings === undefined || gaps === undefined || recommendations === undefined) {
      throw fields.fail();
    }
    return { ...base, kind: "gap-analysis", status: "completed", findings, gaps, recommendations };
  }

  if (kind.success && kind.data === "synthesis") {
    if (data.status === "running") {
      return { ...base, kind: "synthesis", status: "running" };
    }
    const findings = fields.require("findings");
    const uncertainties = fields.require("uncertainties");
    if (findings === undefined || uncertainties === undefined) throw fields.fail();
    return { ...base, kind: "synthesis", status: "completed", findings, uncertainties };
  }

  if (data.status === "running") {
    return { ...base, kind: "analysis", analysisType, status: "running" };
  }
  const findings = fields.require("findings");
  if (findings === undefined) throw fields.fail();
  return { ...base, kind: "analysis", analysisType, status: "completed", findings };
}

function flatten(event: StreamEvent): StreamUpdateDataInput {
  const common = {
    id: event.id,
    title: event.title,
    message: event.message,
    timestamp: event.timestamp,
    overwrite: event.overwrite,
  };

  switch (event.kind) {
    case "plan":
      return event.status === "running"
        ? { ...common, type: "plan", status: "running" }
        : {
            ...common,
            type: "plan",
            status: "completed",
            plan: event.plan,
            totalSteps: event.totalSteps,
          };

    case "search":
      return event.status === "running"
        ? { ...common, type: event.source, status: "running", query: event.query }
        : {
            ...common,
            type: event.source,
            status: "completed",
            query: event.query,
            results: event.results,
          };

    case "analysis":
      return event.status === "running"
        ? { ...common, type: "analysis", status: "running", analysisType: event.analysisType }
        : {
            ...common,
            type: "analysis",
            status: "completed",
            analysisType: event.analysisType,
            findings: event.findings,
          };

    case "gap-analysis":
      return event.status === "running"
        ? { ...common, type: "analysis", status: "running", analysisType: "gaps" }
        : {
            ...common,
            type: "analysis",
            status: "completed",
            analysisType: "gaps",
            findings: event.findings,
            gaps: event.gaps,
            recommendations: event.recommendations,
          };

    case "synthesis":
      return event.status === "running"
        ? { ...common, type: "analysis", status: "running", analysisType: "synthesis" }
        : {
            ...common,
            type: "analysis",
            status: "completed",
            analysisType: "synthesis",
            findings: event.findings,
            uncertainties: event.uncertainties,
          };

    case "progress":
      return {
        ...common,
        type: "progress",
        status: event.status,
        completedSteps: event.completedSteps,
        isComplete: event.isComplete,
        totalSteps: event.totalSteps,
      };

    case "error":
      return { ...common, type: "error", status: event.status };

    case "custom":
      return { ...event.fields, ...common, type: event.type, status: event.status };
  }
}

/**
 * Flatten a variant back into the wire payload.
 */
export function fromStreamEvent(event: StreamEvent): Readonly<StreamUpdateData> {
  return StreamUpdateDataRecord.create(flatten(event));
}
