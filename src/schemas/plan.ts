/**
 * Research plan records.
 *
 * The planning phase emits a ResearchPlan: the search queries to run and
 * the analyses to perform on their results, both in execution order.
 */

import { z } from "zod";
import { SearchQuerySource } from "./enums.js";
import { integer } from "./fields.js";
import { defineRecord } from "./record.js";

/**
 * A single search query within the research plan.
 */
export const SearchQuerySchema = z.object({
  /** The search query string */
  query: z.string(),

  /** Why this query matters for the research question */
  rationale: z.string(),

  /** Source to search; "all" fans out to web, academic and x */
  source: SearchQuerySource,

  /** Priority, typically 2-4. Lower means more urgent. */
  priority: integer(),
});

export type SearchQuery = z.infer<typeof SearchQuerySchema>;

/**
 * A required analysis step in the research plan.
 */
export const RequiredAnalysisSchema = z.object({
  /** Kind of analysis, e.g. "SWOT", "Comparative", "Sentiment" */
  type: z.string(),

  /** What the analysis should cover */
  description: z.string(),

  /** Importance, typically 1-5. Higher means more important. */
  importance: integer(),
});

export type RequiredAnalysis = z.infer<typeof RequiredAnalysisSchema>;

/**
 * The overall research plan generated by the planner.
 * Either list may be empty.
 */
export const ResearchPlanSchema = z.object({
  search_queries: z.array(SearchQuerySchema),
  required_analyses: z.array(RequiredAnalysisSchema),
});

export type ResearchPlan = z.infer<typeof ResearchPlanSchema>;

export const SearchQueryRecord = defineRecord("SearchQuery", SearchQuerySchema);
export const RequiredAnalysisRecord = defineRecord("RequiredAnalysis", RequiredAnalysisSchema);
export const ResearchPlanRecord = defineRecord("ResearchPlan", ResearchPlanSchema);
