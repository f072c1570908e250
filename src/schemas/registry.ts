/**
 * Registry of every record codec, keyed by record name.
 */

import type { RecordCodec } from "./record.js";
import {
  SearchQueryRecord,
  RequiredAnalysisRecord,
  ResearchPlanRecord,
  type SearchQuery,
  type RequiredAnalysis,
  type ResearchPlan,
} from "./plan.js";
import {
  SearchResultItemRecord,
  SearchStepResultRecord,
  type SearchResultItem,
  type SearchStepResult,
} from "./search.js";
import {
  AnalysisFindingRecord,
  AnalysisResultRecord,
  type AnalysisFinding,
  type AnalysisResult,
} from "./analysis.js";
import {
  LimitationRecord,
  KnowledgeGapRecord,
  RecommendedFollowupRecord,
  GapAnalysisResultRecord,
  type Limitation,
  type KnowledgeGap,
  type RecommendedFollowup,
  type GapAnalysisResult,
} from "./gap-analysis.js";
import {
  KeyFindingRecord,
  FinalSynthesisResultRecord,
  type KeyFinding,
  type FinalSynthesisResult,
} from "./synthesis.js";
import {
  StepInfoRecord,
  StreamUpdateDataRecord,
  StreamUpdateRecord,
  type StepInfo,
  type StreamUpdateData,
  type StreamUpdate,
} from "./stream.js";

export interface RecordTypeMap {
  SearchQuery: SearchQuery;
  RequiredAnalysis: RequiredAnalysis;
  ResearchPlan: ResearchPlan;
  SearchResultItem: SearchResultItem;
  SearchStepResult: SearchStepResult;
  AnalysisFinding: AnalysisFinding;
  AnalysisResult: AnalysisResult;
  Limitation: Limitation;
  KnowledgeGap: KnowledgeGap;
  RecommendedFollowup: RecommendedFollowup;
  GapAnalysisResult: GapAnalysisResult;
  KeyFinding: KeyFinding;
  FinalSynthesisResult: FinalSynthesisResult;
  StepInfo: StepInfo;
  StreamUpdateData: StreamUpdateData;
  StreamUpdate: StreamUpdate;
}

export type RecordName = keyof RecordTypeMap;

export const RECORD_TYPES: { [K in RecordName]: RecordCodec<RecordTypeMap[K]> } = {
  SearchQuery: SearchQueryRecord,
  RequiredAnalysis: RequiredAnalysisRecord,
  ResearchPlan: ResearchPlanRecord,
  SearchResultItem: SearchResultItemRecord,
  SearchStepResult: SearchStepResultRecord,
  AnalysisFinding: AnalysisFindingRecord,
  AnalysisResult: AnalysisResultRecord,
  Limitation: LimitationRecord,
  KnowledgeGap: KnowledgeGapRecord,
  RecommendedFollowup: RecommendedFollowupRecord,
  GapAnalysisResult: GapAnalysisResultRecord,
  KeyFinding: KeyFindingRecord,
  FinalSynthesisResult: FinalSynthesisResultRecord,
  StepInfo: StepInfoRecord,
  StreamUpdateData: StreamUpdateDataRecord,
  StreamUpdate: StreamUpdateRecord,
};

export const RECORD_NAMES = Object.keys(RECORD_TYPES).filter(isRecordName);

export function isRecordName(value: string): value is RecordName {
  return Object.hasOwn(RECORD_TYPES, value);
}
