/**
 * Data contracts for a streamed, multi-phase research pipeline.
 */

export * from "./schemas/index.js";
export * from "./stream/index.js";
