/**
 * Step bookkeeping and streaming update records.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * WIRE SHAPE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Each progress event is framed as
 *
 *   { "type": "research_update", "data": { ...StreamUpdateData } }
 *
 * StreamUpdateData is deliberately flat: which optional fields are present
 * depends on (data.type, data.status).
 *
 *   data.type          data.status              optional fields
 *   ─────────────────  ───────────────────────  ─────────────────────────────
 *   plan               completed                plan, totalSteps
 *   web/academic/x     running -> completed     query (+ results)
 *   analysis           running -> completed     analysisType (+ findings)
 *     analysisType=gaps       completed         findings, gaps, recommendations
 *     analysisType=synthesis  completed         findings, uncertainties
 *   progress           running                  completedSteps, isComplete
 *   error              completed                (detail in message)
 *
 * A missing optional field means "not applicable to this event". The typed
 * variant view of this table lives in stream/events.ts.
 *
 * overwrite=true tells the consumer to replace the earlier message with the
 * same id instead of appending a new one.
 */

import { z } from "zod";
import { STREAM_UPDATE_TYPE, StreamStatus } from "./enums.js";
import { integer, jsonObject, optional, textList } from "./fields.js";
import { ResearchPlanSchema } from "./plan.js";
import { SearchResultItemSchema } from "./search.js";
import { KnowledgeGapSchema, RecommendedFollowupSchema } from "./gap-analysis.js";
import { defineRecord } from "./record.js";

/**
 * Planned step bookkeeping.
 *
 * details is an opaque payload owned by the producer (usually the planned
 * query or analysis object); nothing here inspects it beyond requiring
 * JSON values. Keeping ids unique within a plan is the caller's job, see
 * findDuplicateStepIds().
 */
export const StepInfoSchema = z.object({
  id: z.string(),
  /** "web", "academic", "x" or "analysis" */
  type: z.string(),
  details: jsonObject(),
});

export type StepInfo = z.infer<typeof StepInfoSchema>;

/**
 * Simplified analysis finding as streamed to the consumer. Free-form JSON.
 */
export const StreamFindingSchema = jsonObject();
export type StreamFinding = z.infer<typeof StreamFindingSchema>;

export const StreamUpdateDataSchema = z.object({
  /** Step or phase this update refers to */
  id: z.string(),

  /** "plan", "web", "academic", "x", "analysis", "progress", "error", ... */
  type: z.string(),

  status: StreamStatus,

  /** Display title */
  title: z.string(),

  /** Status or result description; carries the detail of error events */
  message: z.string(),

  /** Epoch seconds, fractional part allowed */
  timestamp: z.number().finite(),

  /** Replace the previous update with the same id (default false) */
  overwrite: z
    .boolean()
    .nullish()
    .transform((value) => value ?? false),

  plan: optional(ResearchPlanSchema),
  totalSteps: optional(integer()),
  query: optional(z.string()),
  results: optional(z.array(SearchResultItemSchema)),
  analysisType: optional(z.string()),
  findings: optional(z.array(StreamFindingSchema)),
  gaps: optional(z.array(KnowledgeGapSchema)),
  recommendations: optional(z.array(RecommendedFollowupSchema)),
  uncertainties: optional(textList()),
  completedSteps: optional(integer()),
  isComplete: optional(z.boolean()),
});

export type StreamUpdateData = z.infer<typeof StreamUpdateDataSchema>;

/** Input shape of StreamUpdateData: overwrite may be left out. */
export type StreamUpdateDataInput = z.input<typeof StreamUpdateDataSchema>;

/**
 * Envelope for one streamed event. type defaults to "research_update" and
 * no other value is accepted.
 */
export const StreamUpdateSchema = z.object({
  type: z.literal(STREAM_UPDATE_TYPE).default(STREAM_UPDATE_TYPE),
  data: StreamUpdateDataSchema,
});

export type StreamUpdate = z.infer<typeof StreamUpdateSchema>;

export const StepInfoRecord = defineRecord("StepInfo", StepInfoSchema);
export const StreamUpdateDataRecord = defineRecord("StreamUpdateData", StreamUpdateDataSchema);
export const StreamUpdateRecord = defineRecord("StreamUpdate", StreamUpdateSchema);
