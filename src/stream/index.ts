/**
 * Streaming helpers built on the schema layer.
 */

export {
  buildPlanSteps,
  expandQuerySource,
  searchStepId,
  analysisStepId,
} from "./steps.js";

export {
  toStreamEvent,
  fromStreamEvent,
  type StreamEvent,
  type StreamEventKind,
  type PlanEvent,
  type SearchEvent,
  type AnalysisEvent,
  type GapAnalysisEvent,
  type SynthesisEvent,
  type ProgressEvent,
  type ErrorEvent,
  type CustomEvent,
} from "./events.js";

export {
  PHASE_IDS,
  epochSeconds,
  toStreamUpdate,
  planStartedUpdate,
  planUpdate,
  searchUpdate,
  analysisUpdate,
  gapAnalysisUpdate,
  synthesisUpdate,
  progressUpdate,
  errorUpdate,
  type UpdateOptions,
  type SearchStepRef,
  type ProgressCounts,
} from "./updates.js";

export {
  encodeStreamUpdate,
  decodeStreamUpdates,
  replayStreamUpdates,
  type StreamLineResult,
} from "./framing.js";
