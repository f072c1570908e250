/**
 * Advisory checks: conditions worth flagging that never fail validation.
 *
 * The numeric fields of the research records carry documented "typical"
 * ranges (priority 2-4, importance 1-5, severity 2-10, confidence 0-1).
 * The schemas only enforce type-correctness; values outside these ranges
 * are reported here as warnings so producers can be tuned.
 *
 * Step id uniqueness within a plan is likewise left to the caller and is
 * checked by findDuplicateStepIds().
 */

import type { RecordName, RecordTypeMap } from "./registry.js";
import type { ResearchPlan, SearchQuery, RequiredAnalysis } from "./plan.js";
import type { SearchStepResult } from "./search.js";
import type { AnalysisFinding, AnalysisResult } from "./analysis.js";
import type { GapAnalysisResult, Limitation, RecommendedFollowup } from "./gap-analysis.js";
import type { FinalSynthesisResult, KeyFinding } from "./synthesis.js";
import type { StepInfo, StreamUpdate, StreamUpdateData } from "./stream.js";

export interface AdvisoryRange {
  readonly min: number;
  readonly max: number;
}

export const ADVISORY_RANGES = {
  searchQueryPriority: { min: 2, max: 4 },
  analysisImportance: { min: 1, max: 5 },
  limitationSeverity: { min: 2, max: 10 },
  followupPriority: { min: 2, max: 10 },
  confidence: { min: 0, max: 1 },
} as const satisfies Record<string, AdvisoryRange>;

export interface Advisory {
  /** Dotted path of the field, e.g. "search_queries.1.priority" */
  path: string;
  message: string;
  value: number;
}

type Path = readonly (string | number)[];
type Checker<T> = (record: Readonly<T>, path: Path, out: Advisory[]) => void;

function checkRange(
  field: string,
  value: number,
  range: AdvisoryRange,
  path: Path,
  out: Advisory[]
): void {
  if (value < range.min || value > range.max) {
    out.push({
      path: [...path, field].join("."),
      message: `${field} ${value} is outside the usual range ${range.min}-${range.max}`,
      value,
    });
  }
}

function eachItem<T>(items: readonly T[], check: Checker<T>, path: Path, out: Advisory[]): void {
  items.forEach((item, index) => check(item, [...path, index], out));
}

const checkSearchQuery: Checker<SearchQuery> = (query, path, out) => {
  checkRange("priority", query.priority, ADVISORY_RANGES.searchQueryPriority, path, out);
};

const checkRequiredAnalysis: Checker<RequiredAnalysis> = (analysis, path, out) => {
  checkRange("importance", analysis.importance, ADVISORY_RANGES.analysisImportance, path, out);
};

const checkPlan: Checker<ResearchPlan> = (plan, path, out) => {
  eachItem(plan.search_queries, checkSearchQuery, [...path, "search_queries"], out);
  eachItem(plan.required_analyses, checkRequiredAnalysis, [...path, "required_analyses"], out);
};

const checkStepResult: Checker<SearchStepResult> = (step, path, out) => {
  checkSearchQuery(step.query, [...path, "query"], out);
};

const checkAnalysisFinding: Checker<AnalysisFinding> = (finding, path, out) => {
  checkRange("confidence", finding.confidence, ADVISORY_RANGES.confidence, path, out);
};

const checkAnalysisResult: Checker<AnalysisResult> = (result, path, out) => {
  eachItem(result.findings, checkAnalysisFinding, [...path, "findings"], out);
};

const checkLimitation: Checker<Limitation> = (limitation, path, out) => {
  checkRange("severity", limitation.severity, ADVISORY_RANGES.limitationSeverity, path, out);
};

const checkFollowup: Checker<RecommendedFollowup> = (followup, path, out) => {
  checkRange("priority", followup.priority, ADVISORY_RANGES.followupPriority, path, out);
};

const checkGapAnalysis: Checker<GapAnalysisResult> = (result, path, out) => {
  eachItem(result.limitations, checkLimitation, [...path, "limitations"], out);
  eachItem(result.recommended_followup, checkFollowup, [...path, "recommended_followup"], out);
};

const checkKeyFinding: Checker<KeyFinding> = (finding, path, out) => {
  checkRange("confidence", finding.confidence, ADVISORY_RANGES.confidence, path, out);
};

const checkSynthesis: Checker<FinalSynthesisResult> = (result, path, out) => {
  eachItem(result.key_findings, checkKeyFinding, [...path, "key_findings"], out);
};

const checkStreamData: Checker<StreamUpdateData> = (data, path, out) => {
  if (data.plan) {
    checkPlan(data.plan, [...path, "plan"], out);
  }
  if (data.recommendations) {
    eachItem(data.recommendations, checkFollowup, [...path, "recommendations"], out);
  }
};

const checkStreamUpdate: Checker<StreamUpdate> = (update, path, out) => {
  checkStreamData(update.data, [...path, "data"], out);
};

const noAdvisories: Checker<unknown> = () => {};

const CHECKERS: { [K in RecordName]: Checker<RecordTypeMap[K]> } = {
  SearchQuery: checkSearchQuery,
  RequiredAnalysis: checkRequiredAnalysis,
  ResearchPlan: checkPlan,
  SearchResultItem: noAdvisories,
  SearchStepResult: checkStepResult,
  AnalysisFinding: checkAnalysisFinding,
  AnalysisResult: checkAnalysisResult,
  Limitation: checkLimitation,
  KnowledgeGap: noAdvisories,
  RecommendedFollowup: checkFollowup,
  GapAnalysisResult: checkGapAnalysis,
  KeyFinding: checkKeyFinding,
  FinalSynthesisResult: checkSynthesis,
  StepInfo: noAdvisories,
  StreamUpdateData: checkStreamData,
  StreamUpdate: checkStreamUpdate,
};

/**
 * Collect advisory warnings for a validated record, nested records included.
 */
export function collectAdvisories<K extends RecordName>(
  name: K,
  record: Readonly<RecordTypeMap[K]>
): Advisory[] {
  const out: Advisory[] = [];
  const check: Checker<RecordTypeMap[K]> = CHECKERS[name];
  check(record, [], out);
  return out;
}

export interface DuplicateStepId {
  id: string;
  firstIndex: number;
  duplicateIndex: number;
}

/**
 * Report every repeated step id (first occurrence wins).
 */
export function findDuplicateStepIds(steps: readonly StepInfo[]): DuplicateStepId[] {
  const seen = new Map<string, number>();
  const duplicates: DuplicateStepId[] = [];

  steps.forEach((step, index) => {
    const firstIndex = seen.get(step.id);
    if (firstIndex !== undefined) {
      duplicates.push({ id: step.id, firstIndex, duplicateIndex: index });
    } else {
      seen.set(step.id, index);
    }
  });

  return duplicates;
}
