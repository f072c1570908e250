/**
 * Research pipeline schema layer.
 *
 * Validated, immutable records for every message exchanged between the
 * phases of a research run (planning, search, analysis, gap analysis,
 * synthesis) and for the progress events streamed to the client.
 *
 * Usage:
 *   import { ResearchPlanRecord, StreamUpdateRecord } from "./schemas/index.js";
 *
 *   // Validate planner output (throws ValidationError)
 *   const plan = ResearchPlanRecord.fromJSON(llmOutput);
 *
 *   // Frame a progress event
 *   const wire = StreamUpdateRecord.serialize(update);
 */

// Errors
export {
  ValidationError,
  toValidationIssues,
  formatPath,
  type ValidationIssue,
} from "./errors.js";

// Enumerations
export {
  SearchSource,
  SearchQuerySource,
  StreamStatus,
  StreamStepType,
  AnalysisKind,
  STREAM_UPDATE_TYPE,
} from "./enums.js";

// Shared fields
export { JsonValueSchema, type JsonValue } from "./fields.js";

// Record codec contract
export {
  defineRecord,
  type RecordCodec,
  type ParseOptions,
  type SafeCreateResult,
} from "./record.js";

// Plan
export {
  SearchQuerySchema,
  RequiredAnalysisSchema,
  ResearchPlanSchema,
  SearchQueryRecord,
  RequiredAnalysisRecord,
  ResearchPlanRecord,
  type SearchQuery,
  type RequiredAnalysis,
  type ResearchPlan,
} from "./plan.js";

// Search
export {
  SearchResultItemSchema,
  SearchStepResultSchema,
  SearchResultItemRecord,
  SearchStepResultRecord,
  type SearchResultItem,
  type SearchStepResult,
} from "./search.js";

// Analysis
export {
  AnalysisFindingSchema,
  AnalysisResultSchema,
  AnalysisFindingRecord,
  AnalysisResultRecord,
  type AnalysisFinding,
  type AnalysisResult,
} from "./analysis.js";

// Gap analysis
export {
  LimitationSchema,
  KnowledgeGapSchema,
  RecommendedFollowupSchema,
  GapAnalysisResultSchema,
  LimitationRecord,
  KnowledgeGapRecord,
  RecommendedFollowupRecord,
  GapAnalysisResultRecord,
  type Limitation,
  type KnowledgeGap,
  type RecommendedFollowup,
  type GapAnalysisResult,
} from "./gap-analysis.js";

// Synthesis
export {
  KeyFindingSchema,
  FinalSynthesisResultSchema,
  KeyFindingRecord,
  FinalSynthesisResultRecord,
  type KeyFinding,
  type FinalSynthesisResult,
} from "./synthesis.js";

// Streaming
export {
  StepInfoSchema,
  StreamFindingSchema,
  StreamUpdateDataSchema,
  StreamUpdateSchema,
  StepInfoRecord,
  StreamUpdateDataRecord,
  StreamUpdateRecord,
  type StepInfo,
  type StreamFinding,
  type StreamUpdateData,
  type StreamUpdateDataInput,
  type StreamUpdate,
} from "./stream.js";

// Registry
export {
  RECORD_TYPES,
  RECORD_NAMES,
  isRecordName,
  type RecordName,
  type RecordTypeMap,
} from "./registry.js";

// Advisories
export {
  ADVISORY_RANGES,
  collectAdvisories,
  findDuplicateStepIds,
  type Advisory,
  type AdvisoryRange,
  type DuplicateStepId,
} from "./advisories.js";
