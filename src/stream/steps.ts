/**
 * Expansion of a research plan into tracked steps.
 */

import {
  SearchSource,
  StepInfoRecord,
  type ResearchPlan,
  type SearchQuerySource,
  type StepInfo,
} from "../schemas/index.js";

/**
 * Concrete sources a planned query runs against. "all" fans out to every
 * source, in the order they are declared.
 */
export function expandQuerySource(source: SearchQuerySource): SearchSource[] {
  return source === "all" ? [...SearchSource.options] : [source];
}

export function searchStepId(queryIndex: number, source: SearchSource): string {
  return `search-${queryIndex}-${source}`;
}

export function analysisStepId(analysisIndex: number): string {
  return `analysis-${analysisIndex}`;
}

/**
 * Build the step list for a plan: one step per (query, concrete source),
 * then one per required analysis. Ids are unique by construction.
 */
export function buildPlanSteps(plan: ResearchPlan): Readonly<StepInfo>[] {
  const steps: Readonly<StepInfo>[] = [];

  plan.search_queries.forEach((query, queryIndex) => {
    for (const source of expandQuerySource(query.source)) {
      steps.push(
        StepInfoRecord.create({
          id: searchStepId(queryIndex, source),
          type: source,
          details: { ...query },
        })
      );
    }
  });

  plan.required_analyses.forEach((analysis, analysisIndex) => {
    steps.push(
      StepInfoRecord.create({
        id: analysisStepId(analysisIndex),
        type: "analysis",
        details: { ...analysis },
      })
    );
  });

  return steps;
}
