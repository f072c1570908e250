/**
 * Gap analysis records.
 *
 * After the planned searches and analyses complete, a review pass reports
 * what the research could not establish: limitations of the evidence,
 * knowledge gaps, and follow-up actions worth taking.
 */

import { z } from "zod";
import { integer, textList } from "./fields.js";
import { defineRecord } from "./record.js";

export const LimitationSchema = z.object({
  /** e.g. "Source Bias", "Data Scarcity" */
  type: z.string(),
  description: z.string(),
  /** Severity, typically 2-10. Higher means more severe. */
  severity: integer(),
  potential_solutions: textList(),
});

export type Limitation = z.infer<typeof LimitationSchema>;

export const KnowledgeGapSchema = z.object({
  topic: z.string(),
  /** Why the gap exists or matters */
  reason: z.string(),
  /** Queries that could help fill the gap */
  additional_queries: textList(),
});

export type KnowledgeGap = z.infer<typeof KnowledgeGapSchema>;

export const RecommendedFollowupSchema = z.object({
  action: z.string(),
  rationale: z.string(),
  /** Priority, typically 2-10 */
  priority: integer(),
});

export type RecommendedFollowup = z.infer<typeof RecommendedFollowupSchema>;

export const GapAnalysisResultSchema = z.object({
  limitations: z.array(LimitationSchema),
  knowledge_gaps: z.array(KnowledgeGapSchema),
  recommended_followup: z.array(RecommendedFollowupSchema),
});

export type GapAnalysisResult = z.infer<typeof GapAnalysisResultSchema>;

export const LimitationRecord = defineRecord("Limitation", LimitationSchema);
export const KnowledgeGapRecord = defineRecord("KnowledgeGap", KnowledgeGapSchema);
export const RecommendedFollowupRecord = defineRecord("RecommendedFollowup", RecommendedFollowupSchema);
export const GapAnalysisResultRecord = defineRecord("GapAnalysisResult", GapAnalysisResultSchema);
