/**
 * Search result records.
 */

import { z } from "zod";
import { SearchSource } from "./enums.js";
import { optional } from "./fields.js";
import { SearchQuerySchema } from "./plan.js";
import { defineRecord } from "./record.js";

/**
 * A single item returned from a search provider.
 *
 * tweetId only makes sense for results from x; carrying one on a web or
 * academic result is rejected.
 */
export const SearchResultItemSchema = z
  .object({
    source: SearchSource,
    title: z.string(),
    url: z.string(),
    /** Content snippet or summary of the result */
    content: z.string(),
    tweetId: optional(z.string()),
  })
  .superRefine((item, ctx) => {
    if (item.tweetId !== undefined && item.source !== "x") {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["tweetId"],
        message: `tweetId is only allowed when source is "x" (got source "${item.source}")`,
      });
    }
  });

export type SearchResultItem = z.infer<typeof SearchResultItemSchema>;

/**
 * Results obtained from executing a single search step.
 */
export const SearchStepResultSchema = z.object({
  /** Concrete source searched for this step ("all" is never a step type) */
  type: SearchSource,

  /** Copy of the planned query that prompted this search */
  query: SearchQuerySchema,

  /** May be empty */
  results: z.array(SearchResultItemSchema),
});

export type SearchStepResult = z.infer<typeof SearchStepResultSchema>;

export const SearchResultItemRecord = defineRecord("SearchResultItem", SearchResultItemSchema);
export const SearchStepResultRecord = defineRecord("SearchStepResult", SearchStepResultSchema);
