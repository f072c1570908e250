import { z } from "zod";
import { confidence, textList } from "./fields.js";
import { defineRecord } from "./record.js";

/**
 * A single insight from an analysis step.
 */
export const AnalysisFindingSchema = z.object({
  insight: z.string(),
  /** Supporting evidence: short quotes, source references */
  evidence: textList(),
  confidence: confidence(),
});

export type AnalysisFinding = z.infer<typeof AnalysisFindingSchema>;

/**
 * Structured output of one analysis.
 */
export const AnalysisResultSchema = z.object({
  findings: z.array(AnalysisFindingSchema),
  implications: textList(),
  /** Limitations noted during this specific analysis */
  limitations: textList(),
});

export type AnalysisResult = z.infer<typeof AnalysisResultSchema>;

export const AnalysisFindingRecord = defineRecord("AnalysisFinding", AnalysisFindingSchema);
export const AnalysisResultRecord = defineRecord("AnalysisResult", AnalysisResultSchema);
