/**
 * Final synthesis records.
 *
 * Only the deep research mode runs a synthesis phase; nothing in the schema
 * enforces that.
 */

import { z } from "zod";
import { confidence, textList } from "./fields.js";
import { defineRecord } from "./record.js";

export const KeyFindingSchema = z.object({
  finding: z.string(),
  confidence: confidence(),
  /** References to specific search results or analyses */
  supporting_evidence: textList(),
});

export type KeyFinding = z.infer<typeof KeyFindingSchema>;

export const FinalSynthesisResultSchema = z.object({
  key_findings: z.array(KeyFindingSchema),
  remaining_uncertainties: textList(),
});

export type FinalSynthesisResult = z.infer<typeof FinalSynthesisResultSchema>;

export const KeyFindingRecord = defineRecord("KeyFinding", KeyFindingSchema);
export const FinalSynthesisResultRecord = defineRecord("FinalSynthesisResult", FinalSynthesisResultSchema);
