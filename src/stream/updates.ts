/**
 * Builders for StreamUpdate envelopes.
 *
 * Producers of the stream call these instead of assembling the flat wire
 * payload by hand, so each update carries exactly the optional fields its
 * (type, status) row calls for. Every builder returns a validated, frozen
 * StreamUpdate.
 */

import {
  STREAM_UPDATE_TYPE,
  StreamUpdateRecord,
  type AnalysisFinding,
  type FinalSynthesisResult,
  type GapAnalysisResult,
  type ResearchPlan,
  type SearchResultItem,
  type SearchSource,
  type StreamUpdate,
} from "../schemas/index.js";
import { fromStreamEvent, type StreamEvent } from "./events.js";

/** Fixed ids of the phase-level updates */
export const PHASE_IDS = {
  plan: "research-plan",
  gapAnalysis: "gap-analysis",
  synthesis: "final-synthesis",
  progress: "research-progress",
} as const;

export interface UpdateOptions {
  /** Clock in epoch seconds (default: Date.now() / 1000) */
  now?: () => number;
  /** Override the default title */
  title?: string;
  /** Override the default message */
  message?: string;
  /** Override the default overwrite flag */
  overwrite?: boolean;
}

export function epochSeconds(): number {
  return Date.now() / 1000;
}

interface Defaults {
  id: string;
  title: string;
  message: string;
  overwrite: boolean;
}

function common(defaults: Defaults, options: UpdateOptions) {
  return {
    id: defaults.id,
    title: options.title ?? defaults.title,
    message: options.message ?? defaults.message,
    overwrite: options.overwrite ?? defaults.overwrite,
    timestamp: (options.now ?? epochSeconds)(),
  };
}

/**
 * Wrap a variant into a validated StreamUpdate envelope.
 */
export function toStreamUpdate(event: StreamEvent): Readonly<StreamUpdate> {
  return StreamUpdateRecord.create({
    type: STREAM_UPDATE_TYPE,
    data: fromStreamEvent(event),
  });
}

export function planStartedUpdate(options: UpdateOptions = {}): Readonly<StreamUpdate> {
  return toStreamUpdate({
    ...common(
      {
        id: PHASE_IDS.plan,
        title: "Research Plan",
        message: "Creating research plan...",
        overwrite: false,
      },
      options
    ),
    kind: "plan",
    status: "running",
  });
}

export function planUpdate(
  plan: ResearchPlan,
  totalSteps: number,
  options: UpdateOptions = {}
): Readonly<StreamUpdate> {
  return toStreamUpdate({
    ...common(
      {
        id: PHASE_IDS.plan,
        title: "Research Plan",
        message: "Research plan created",
        overwrite: true,
      },
      options
    ),
    kind: "plan",
    status: "completed",
    plan,
    totalSteps,
  });
}

export interface SearchStepRef {
  /** Step id, see buildPlanSteps() */
  id: string;
  source: SearchSource;
  query: string;
}

/**
 * Search step update: running while results is undefined, completed once
 * results are known (an empty list is a completed search with no hits).
 */
export function searchUpdate(
  step: SearchStepRef,
  results?: SearchResultItem[],
  options: UpdateOptions = {}
): Readonly<StreamUpdate> {
  const title = `Searching ${step.source} for "${step.query}"`;

  if (results === undefined) {
    return toStreamUpdate({
      ...common({ id: step.id, title, message: `Searching ${step.source}...`, overwrite: false }, options),
      kind: "search",
      source: step.source,
      query: step.query,
      status: "running",
    });
  }

  return toStreamUpdate({
    ...common(
      { id: step.id, title, message: `Found ${results.length} results`, overwrite: true },
      options
    ),
    kind: "search",
    source: step.source,
    query: step.query,
    status: "completed",
    results,
  });
}

/**
 * Analysis step update: running while findings is undefined.
 */
export function analysisUpdate(
  id: string,
  analysisType: string,
  findings?: AnalysisFinding[],
  options: UpdateOptions = {}
): Readonly<StreamUpdate> {
  const title = `${analysisType} Analysis`;

  if (findings === undefined) {
    return toStreamUpdate({
      ...common({ id, title, message: `Analyzing ${analysisType}...`, overwrite: false }, options),
      kind: "analysis",
      analysisType,
      status: "running",
    });
  }

  return toStreamUpdate({
    ...common(
      { id, title, message: `Analysis complete: ${findings.length} findings`, overwrite: true },
      options
    ),
    kind: "analysis",
    analysisType,
    status: "completed",
    findings: findings.map((finding) => ({ ...finding })),
  });
}

/**
 * Completed gap analysis. Limitations stream as simplified findings.
 */
export function gapAnalysisUpdate(
  result: GapAnalysisResult,
  options: UpdateOptions = {}
): Readonly<StreamUpdate> {
  return toStreamUpdate({
    ...common(
      {
        id: PHASE_IDS.gapAnalysis,
        title: "Research Gaps and Limitations",
        message: `Identified ${result.limitations.length} limitations and ${result.knowledge_gaps.length} knowledge gaps`,
        overwrite: true,
      },
      options
    ),
    kind: "gap-analysis",
    status: "completed",
    findings: result.limitations.map((limitation) => ({
      insight: limitation.description,
      evidence: limitation.potential_solutions,
      type: limitation.type,
      severity: limitation.severity,
    })),
    gaps: result.knowledge_gaps,
    recommendations: result.recommended_followup,
  });
}

/**
 * Completed final synthesis (deep research mode only).
 */
export function synthesisUpdate(
  result: FinalSynthesisResult,
  options: UpdateOptions = {}
): Readonly<StreamUpdate> {
  return toStreamUpdate({
    ...common(
      {
        id: PHASE_IDS.synthesis,
        title: "Final Research Synthesis",
        message: `Synthesized ${result.key_findings.length} key findings`,
        overwrite: true,
      },
      options
    ),
    kind: "synthesis",
    status: "completed",
    findings: result.key_findings.map((keyFinding) => ({
      insight: keyFinding.finding,
      evidence: keyFinding.supporting_evidence,
      confidence: keyFinding.confidence,
    })),
    uncertainties: result.remaining_uncertainties,
  });
}

export interface ProgressCounts {
  completedSteps: number;
  totalSteps: number;
  isComplete: boolean;
}

export function progressUpdate(
  counts: ProgressCounts,
  options: UpdateOptions = {}
): Readonly<StreamUpdate> {
  const message = counts.isComplete
    ? "Research complete"
    : `Completed ${counts.completedSteps} of ${counts.totalSteps} steps`;

  return toStreamUpdate({
    ...common(
      { id: PHASE_IDS.progress, title: "Research Progress", message, overwrite: true },
      options
    ),
    kind: "progress",
    status: counts.isComplete ? "completed" : "running",
    completedSteps: counts.completedSteps,
    totalSteps: counts.totalSteps,
    isComplete: counts.isComplete,
  });
}

/**
 * Error update for a step or phase. The detail travels in message.
 */
export function errorUpdate(
  id: string,
  error: unknown,
  options: UpdateOptions = {}
): Readonly<StreamUpdate> {
  const detail = error instanceof Error ? error.message : String(error);
  return toStreamUpdate({
    ...common({ id, title: "Error", message: detail, overwrite: true }, options),
    kind: "error",
    status: "completed",
  });
}
