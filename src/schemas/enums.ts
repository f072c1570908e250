/**
 * Enumerations shared by the research pipeline records.
 *
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║  WIRE CONTRACT: these values travel verbatim between the planner, the     ║
 * ║  search clients, the analysis steps and the streaming consumer. Adding a  ║
 * ║  value is backwards compatible for producers only; consumers built        ║
 * ║  against the old set will reject it.                                      ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 */

import { z } from "zod";

/**
 * Where a search result came from. Also the type of a search step.
 */
export const SearchSource = z.enum(["web", "academic", "x"]);
export type SearchSource = z.infer<typeof SearchSource>;

/**
 * Sources a planned query may target. "all" fans out to every SearchSource.
 */
export const SearchQuerySource = z.enum(["web", "academic", "x", "all"]);
export type SearchQuerySource = z.infer<typeof SearchQuerySource>;

/**
 * Lifecycle of a streamed step or phase.
 */
export const StreamStatus = z.enum(["running", "completed"]);
export type StreamStatus = z.infer<typeof StreamStatus>;

/**
 * Known values of StreamUpdateData.type.
 *
 * The wire field itself is an open string; unknown values are carried
 * through as custom events.
 */
export const StreamStepType = z.enum([
  "plan",
  "web",
  "academic",
  "x",
  "analysis",
  "progress",
  "error",
]);
export type StreamStepType = z.infer<typeof StreamStepType>;

/**
 * Reserved analysisType values for the gap-analysis and final-synthesis
 * phases, which stream as "analysis" updates.
 */
export const AnalysisKind = z.enum(["gaps", "synthesis"]);
export type AnalysisKind = z.infer<typeof AnalysisKind>;

/** Constant discriminator of every StreamUpdate envelope. */
export const STREAM_UPDATE_TYPE = "research_update";
