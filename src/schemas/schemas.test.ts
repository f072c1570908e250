/**
 * Schema layer tests.
 *
 * Run: node --import tsx src/schemas/schemas.test.ts
 *
 * Tests cover:
 *   1. Construction: required fields, enums, numeric types
 *   2. Serialization: omitted optionals, null handling, literal discriminator
 *   3. Round-trip: create -> toJSON -> fromJSON for every record family
 *   4. Parsing policy: lenient by default, strict on request
 *   5. Immutability, advisories and duplicate step ids
 */

import { strict as assert } from "node:assert";

import {
  AnalysisResultRecord,
  FinalSynthesisResultRecord,
  GapAnalysisResultRecord,
  KeyFindingRecord,
  AnalysisFindingRecord,
  RECORD_NAMES,
  RECORD_TYPES,
  ResearchPlanRecord,
  SearchQueryRecord,
  SearchResultItemRecord,
  SearchStepResultRecord,
  StepInfoRecord,
  StreamUpdateDataRecord,
  StreamUpdateRecord,
  ValidationError,
  collectAdvisories,
  findDuplicateStepIds,
  isRecordName,
  type ResearchPlan,
  type StepInfo,
} from "./index.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void): void {
  try {
    fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

function expectValidationError(fn: () => unknown): ValidationError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ValidationError) {
      return err;
    }
    throw err;
  }
  throw new Error("Expected a ValidationError");
}

// ═══════════════════════════════════════════════════════════════════════════
// FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

const QUERY = {
  query: "solid-state battery energy density 2024",
  rationale: "Establish the current state of the art",
  source: "academic",
  priority: 2,
};

const PLAN = {
  search_queries: [
    QUERY,
    {
      query: "solid-state battery startups funding",
      rationale: "Market activity",
      source: "all",
      priority: 3,
    },
  ],
  required_analyses: [
    {
      type: "Comparative",
      description: "Compare lithium-ion and solid-state chemistries",
      importance: 4,
    },
  ],
};

const WEB_RESULT = {
  source: "web",
  title: "Battery roundup",
  url: "https://example.com/battery-roundup",
  content: "A summary of recent battery research.",
};

const X_RESULT = {
  source: "x",
  title: "Thread on cell chemistry",
  url: "https://x.com/example/status/1",
  content: "Cell chemistry thread.",
  tweetId: "1",
};

const GAP_ANALYSIS = {
  limitations: [
    {
      type: "Data Scarcity",
      description: "Few independent benchmarks",
      severity: 6,
      potential_solutions: ["Search manufacturer filings"],
    },
  ],
  knowledge_gaps: [
    {
      topic: "Cycle life",
      reason: "No long-term field data",
      additional_queries: ["solid-state battery cycle life field test"],
    },
  ],
  recommended_followup: [
    { action: "Interview cell engineers", rationale: "Primary data", priority: 5 },
  ],
};

const SYNTHESIS = {
  key_findings: [
    {
      finding: "Energy density gains are real but unproven at scale",
      confidence: 0.7,
      supporting_evidence: ["academic result 1", "analysis-0"],
    },
  ],
  remaining_uncertainties: ["Manufacturing cost trajectory"],
};

const RUNNING_WEB_DATA = {
  id: "search-0-web",
  type: "web",
  status: "running",
  title: "Searching web",
  message: "Searching web...",
  timestamp: 1718000000.5,
  query: "solid-state battery energy density 2024",
};

// ═══════════════════════════════════════════════════════════════════════════
// CONSTRUCTION
// ═══════════════════════════════════════════════════════════════════════════

section("Construction");

test("valid SearchQuery constructs with fields preserved", () => {
  const query = SearchQueryRecord.create(QUERY);
  assert.equal(query.query, "solid-state battery energy density 2024");
  assert.equal(query.source, "academic");
  assert.equal(query.priority, 2);
});

test("missing required field names the field", () => {
  const { query: _omitted, ...withoutQuery } = QUERY;
  const error = expectValidationError(() => SearchQueryRecord.create(withoutQuery));
  assert.equal(error.record, "SearchQuery");
  assert.deepEqual(error.fields, ["query"]);
  assert.equal(error.issues[0]?.code, "invalid_type");
});

test("error message and format list every offending field", () => {
  const error = expectValidationError(() => SearchQueryRecord.create({ source: "web" }));
  assert.deepEqual(error.fields, ["query", "rationale", "priority"]);
  assert.equal(
    error.format(),
    [
      "SearchQuery validation failed:",
      "  - query: Required",
      "  - rationale: Required",
      "  - priority: Required",
    ].join("\n")
  );
  assert.equal(error.message, "Invalid SearchQuery: query: Required; rationale: Required; priority: Required");
});

test("SearchQuery accepts every source including all", () => {
  for (const source of ["web", "academic", "x", "all"]) {
    assert.equal(SearchQueryRecord.create({ ...QUERY, source }).source, source);
  }
});

test("SearchQuery rejects a source outside the set", () => {
  const error = expectValidationError(() => SearchQueryRecord.create({ ...QUERY, source: "news" }));
  assert.deepEqual(error.fields, ["source"]);
  assert.equal(error.issues[0]?.code, "invalid_enum_value");
});

test("SearchResultItem rejects source all", () => {
  const error = expectValidationError(() =>
    SearchResultItemRecord.create({ ...WEB_RESULT, source: "all" })
  );
  assert.deepEqual(error.fields, ["source"]);
});

test("SearchStepResult rejects source all as step type", () => {
  const error = expectValidationError(() =>
    SearchStepResultRecord.create({ type: "all", query: QUERY, results: [] })
  );
  assert.deepEqual(error.fields, ["type"]);
});

test("SearchStepResult accepts an empty result list", () => {
  const step = SearchStepResultRecord.create({ type: "academic", query: QUERY, results: [] });
  assert.equal(step.results.length, 0);
});

test("nested errors carry the full path", () => {
  const error = expectValidationError(() =>
    SearchStepResultRecord.create({
      type: "web",
      query: QUERY,
      results: [WEB_RESULT, { ...WEB_RESULT, source: "news" }],
    })
  );
  assert.deepEqual(error.fields, ["results.1.source"]);
});

test("tweetId is accepted on x results", () => {
  assert.equal(SearchResultItemRecord.create(X_RESULT).tweetId, "1");
});

test("tweetId on a web result is rejected", () => {
  const error = expectValidationError(() =>
    SearchResultItemRecord.create({ ...WEB_RESULT, tweetId: "42" })
  );
  assert.deepEqual(error.fields, ["tweetId"]);
  assert.equal(error.issues[0]?.code, "custom");
});

test("null tweetId on a web result reads as absent", () => {
  const item = SearchResultItemRecord.create({ ...WEB_RESULT, tweetId: null });
  assert.equal("tweetId" in item, false);
});

test("integer fields reject fractions", () => {
  const error = expectValidationError(() => SearchQueryRecord.create({ ...QUERY, priority: 2.5 }));
  assert.deepEqual(error.fields, ["priority"]);
});

test("integer fields accept values outside the typical range", () => {
  assert.equal(SearchQueryRecord.create({ ...QUERY, priority: 40 }).priority, 40);
});

test("confidence accepts the 0.0 and 1.0 boundaries", () => {
  assert.equal(KeyFindingRecord.create({ ...SYNTHESIS.key_findings[0], confidence: 0 }).confidence, 0);
  assert.equal(KeyFindingRecord.create({ ...SYNTHESIS.key_findings[0], confidence: 1 }).confidence, 1);
});

test("confidence is not clamped: 1.5 is accepted", () => {
  const finding = AnalysisFindingRecord.create({ insight: "i", evidence: [], confidence: 1.5 });
  assert.equal(finding.confidence, 1.5);
});

test("confidence rejects non-numeric input", () => {
  const error = expectValidationError(() =>
    AnalysisFindingRecord.create({ insight: "i", evidence: [], confidence: "0.9" })
  );
  assert.deepEqual(error.fields, ["confidence"]);
  assert.equal(error.issues[0]?.code, "invalid_type");
});

test("confidence rejects infinity", () => {
  const error = expectValidationError(() =>
    AnalysisFindingRecord.create({ insight: "i", evidence: [], confidence: Infinity })
  );
  assert.deepEqual(error.fields, ["confidence"]);
});

test("null on a required field is a type error", () => {
  const error = expectValidationError(() => SearchQueryRecord.create({ ...QUERY, rationale: null }));
  assert.deepEqual(error.fields, ["rationale"]);
});

test("StreamUpdateData status outside running/completed is rejected", () => {
  const error = expectValidationError(() =>
    StreamUpdateDataRecord.create({ ...RUNNING_WEB_DATA, status: "failed" })
  );
  assert.deepEqual(error.fields, ["status"]);
});

test("StreamUpdateData overwrite defaults to false", () => {
  assert.equal(StreamUpdateDataRecord.create(RUNNING_WEB_DATA).overwrite, false);
  assert.equal(StreamUpdateDataRecord.create({ ...RUNNING_WEB_DATA, overwrite: null }).overwrite, false);
  assert.equal(StreamUpdateDataRecord.create({ ...RUNNING_WEB_DATA, overwrite: true }).overwrite, true);
});

test("safeCreate reports failure without throwing", () => {
  const result = SearchQueryRecord.safeCreate({});
  assert.equal(result.success, false);
  if (!result.success) {
    assert.equal(result.error.issues.length, 4);
  }
});

// ═══════════════════════════════════════════════════════════════════════════
// SERIALIZATION
// ═══════════════════════════════════════════════════════════════════════════

section("Serialization");

test("absent optional fields are omitted, not null", () => {
  const json = SearchResultItemRecord.toJSON(SearchResultItemRecord.create(WEB_RESULT));
  assert.deepEqual(Object.keys(json), ["source", "title", "url", "content"]);
});

test("field names are preserved verbatim", () => {
  const json = GapAnalysisResultRecord.toJSON(GapAnalysisResultRecord.create(GAP_ANALYSIS));
  assert.deepEqual(Object.keys(json), ["limitations", "knowledge_gaps", "recommended_followup"]);
});

test("serialize produces compact JSON text", () => {
  const text = SearchQueryRecord.serialize(SearchQueryRecord.create(QUERY));
  assert.equal(
    text,
    '{"query":"solid-state battery energy density 2024","rationale":"Establish the current state of the art","source":"academic","priority":2}'
  );
});

test("StreamUpdate type defaults to research_update", () => {
  const update = StreamUpdateRecord.create({ data: RUNNING_WEB_DATA });
  assert.equal(StreamUpdateRecord.toJSON(update).type, "research_update");
});

test("StreamUpdate type serializes as research_update when given", () => {
  const update = StreamUpdateRecord.create({ type: "research_update", data: RUNNING_WEB_DATA });
  assert.equal(StreamUpdateRecord.toJSON(update).type, "research_update");
});

test("StreamUpdate rejects any other type", () => {
  const error = expectValidationError(() =>
    StreamUpdateRecord.create({ type: "chat_update", data: RUNNING_WEB_DATA })
  );
  assert.deepEqual(error.fields, ["type"]);
});

test("running web update round-trips with query and no results", () => {
  const update = StreamUpdateRecord.create({ data: { ...RUNNING_WEB_DATA, results: null } });
  const restored = StreamUpdateRecord.parse(StreamUpdateRecord.serialize(update));
  assert.equal(restored.data.query, "solid-state battery energy density 2024");
  assert.equal(restored.data.results, undefined);
  assert.equal("results" in restored.data, false);
  assert.deepEqual(restored, update);
});

test("completed analysis update round-trips with findings", () => {
  const update = StreamUpdateRecord.create({
    data: {
      id: "analysis-0",
      type: "analysis",
      status: "completed",
      title: "Comparative Analysis",
      message: "Analysis complete",
      timestamp: 1718000100,
      overwrite: true,
      analysisType: "Comparative",
      findings: [{ insight: "Solid-state cells are denser", evidence: ["paper A"], confidence: 0.8 }],
    },
  });
  const restored = StreamUpdateRecord.fromJSON(StreamUpdateRecord.toJSON(update));
  assert.deepEqual(restored.data.findings, [
    { insight: "Solid-state cells are denser", evidence: ["paper A"], confidence: 0.8 },
  ]);
  assert.deepEqual(restored, update);
});

test("malformed JSON text is a ValidationError", () => {
  const error = expectValidationError(() => SearchQueryRecord.parse("{not json"));
  assert.equal(error.issues[0]?.code, "invalid_json");
  assert.deepEqual(error.fields, ["(root)"]);
});

test("toJSON re-validates hand-built records", () => {
  const handBuilt = { ...QUERY, source: "academic" as const, priority: 1.5 };
  const error = expectValidationError(() => SearchQueryRecord.toJSON(handBuilt));
  assert.deepEqual(error.fields, ["priority"]);
});

// ═══════════════════════════════════════════════════════════════════════════
// ROUND TRIP
// ═══════════════════════════════════════════════════════════════════════════

section("Round Trip");

test("every record family round-trips through JSON", () => {
  const cases: Array<[string, () => void]> = [
    ["ResearchPlan", () => {
      const r = ResearchPlanRecord.create(PLAN);
      assert.deepEqual(ResearchPlanRecord.parse(ResearchPlanRecord.serialize(r)), r);
    }],
    ["SearchStepResult", () => {
      const r = SearchStepResultRecord.create({ type: "x", query: QUERY, results: [X_RESULT] });
      assert.deepEqual(SearchStepResultRecord.parse(SearchStepResultRecord.serialize(r)), r);
    }],
    ["AnalysisResult", () => {
      const r = AnalysisResultRecord.create({
        findings: [{ insight: "i", evidence: ["e"], confidence: 0.5 }],
        implications: ["cheaper EVs"],
        limitations: [],
      });
      assert.deepEqual(AnalysisResultRecord.parse(AnalysisResultRecord.serialize(r)), r);
    }],
    ["GapAnalysisResult", () => {
      const r = GapAnalysisResultRecord.create(GAP_ANALYSIS);
      assert.deepEqual(GapAnalysisResultRecord.parse(GapAnalysisResultRecord.serialize(r)), r);
    }],
    ["FinalSynthesisResult", () => {
      const r = FinalSynthesisResultRecord.create(SYNTHESIS);
      assert.deepEqual(FinalSynthesisResultRecord.parse(FinalSynthesisResultRecord.serialize(r)), r);
    }],
  ];

  for (const [name, run] of cases) {
    try {
      run();
    } catch (err) {
      throw new Error(`${name}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
});

test("StepInfo details are opaque and round-trip untouched", () => {
  const details = { query: QUERY, tags: ["a", "b"], nested: { depth: 2, flag: null } };
  const step = StepInfoRecord.create({ id: "search-0-academic", type: "academic", details });
  assert.deepEqual(step.details, details);
  assert.deepEqual(StepInfoRecord.parse(StepInfoRecord.serialize(step)), step);
});

test("StepInfo details keep insertion order", () => {
  const step = StepInfoRecord.create({ id: "s", type: "web", details: { z: 1, a: 2, m: 3 } });
  assert.deepEqual(Object.keys(step.details), ["z", "a", "m"]);
});

// ═══════════════════════════════════════════════════════════════════════════
// PARSING POLICY
// ═══════════════════════════════════════════════════════════════════════════

section("Parsing Policy");

test("unknown fields are ignored by default", () => {
  const query = SearchQueryRecord.fromJSON({ ...QUERY, embedding: [0.1, 0.2] });
  assert.equal("embedding" in query, false);
  assert.equal(query.query, QUERY.query);
});

test("unknown nested fields are ignored by default", () => {
  const update = StreamUpdateRecord.fromJSON({
    type: "research_update",
    data: { ...RUNNING_WEB_DATA, progressPercent: 40 },
    sequence: 7,
  });
  assert.equal("sequence" in update, false);
  assert.equal("progressPercent" in update.data, false);
});

test("strict parsing rejects unknown fields at any depth", () => {
  const plan = {
    ...PLAN,
    search_queries: [{ ...QUERY, embedding: [] }],
    version: 2,
  };
  const error = expectValidationError(() => ResearchPlanRecord.fromJSON(plan, { strict: true }));
  assert.deepEqual(error.fields, ["search_queries.0.embedding", "version"]);
  assert.equal(error.issues[0]?.code, "unrecognized_keys");
});

test("strict parsing accepts null optionals and opaque details keys", () => {
  const data = StreamUpdateDataRecord.fromJSON(
    { ...RUNNING_WEB_DATA, plan: null, results: null },
    { strict: true }
  );
  assert.equal(data.plan, undefined);
  const step = StepInfoRecord.fromJSON(
    { id: "s", type: "web", details: { anything: { goes: true } } },
    { strict: true }
  );
  assert.deepEqual(step.details, { anything: { goes: true } });
});

test("strict parsing rejects unknown keys named like Object.prototype members", () => {
  const created = expectValidationError(() =>
    SearchQueryRecord.create({ ...QUERY, constructor: "x" }, { strict: true })
  );
  assert.deepEqual(created.fields, ["constructor"]);
  assert.equal(created.issues[0]?.code, "unrecognized_keys");

  const parsed = expectValidationError(() =>
    SearchQueryRecord.parse(JSON.stringify({ ...QUERY, toString: 1 }), { strict: true })
  );
  assert.deepEqual(parsed.fields, ["toString"]);

  const envelope = expectValidationError(() =>
    StreamUpdateRecord.fromJSON(
      { data: { ...RUNNING_WEB_DATA, valueOf: 2 }, hasOwnProperty: true },
      { strict: true }
    )
  );
  assert.deepEqual(envelope.fields, ["data.valueOf", "hasOwnProperty"]);
});

test("lenient parsing drops keys named like Object.prototype members", () => {
  const query = SearchQueryRecord.create({ ...QUERY, constructor: "x" });
  assert.equal(Object.hasOwn(query, "constructor"), false);
});

// ═══════════════════════════════════════════════════════════════════════════
// OPAQUE JSON MAPS
// ═══════════════════════════════════════════════════════════════════════════

section("Opaque JSON Maps");

test("details rejects a function with a ValidationError", () => {
  const error = expectValidationError(() =>
    StepInfoRecord.create({ id: "s", type: "web", details: { f: () => 1 } })
  );
  assert.equal(error.record, "StepInfo");
  assert.deepEqual(error.fields, ["details.f"]);
});

test("details rejects a Date, which JSON would turn into a string", () => {
  const error = expectValidationError(() =>
    StepInfoRecord.create({ id: "s", type: "web", details: { at: new Date(0) } })
  );
  assert.deepEqual(error.fields, ["details.at"]);
});

test("streamed findings reject non-finite numbers", () => {
  const error = expectValidationError(() =>
    StreamUpdateDataRecord.create({ ...RUNNING_WEB_DATA, findings: [{ insight: "i", score: NaN }] })
  );
  assert.deepEqual(error.fields, ["findings.0.score"]);
});

test("nested JSON details round-trip and are deeply frozen", () => {
  const step = StepInfoRecord.create({
    id: "s",
    type: "web",
    details: { nested: { list: [1, "two", null, { deep: true }] } },
  });
  assert.deepEqual(StepInfoRecord.fromJSON(JSON.parse(StepInfoRecord.serialize(step))), step);
  assert.ok(Object.isFrozen(step.details.nested));
});

test("class instances in details become plain frozen objects", () => {
  class Point {
    x = 1;
    y = 2;
  }
  const step = StepInfoRecord.create({ id: "s", type: "web", details: { origin: new Point() } });
  assert.deepEqual(step.details, { origin: { x: 1, y: 2 } });
  assert.ok(Object.isFrozen(step.details.origin));
});

// ═══════════════════════════════════════════════════════════════════════════
// IMMUTABILITY, ADVISORIES, REGISTRY
// ═══════════════════════════════════════════════════════════════════════════

section("Immutability, Advisories, Registry");

test("constructed records are deeply frozen", () => {
  const plan = ResearchPlanRecord.create(PLAN);
  assert.ok(Object.isFrozen(plan));
  assert.ok(Object.isFrozen(plan.search_queries));
  assert.ok(Object.isFrozen(plan.search_queries[0]));
});

test("construction does not freeze the caller's input", () => {
  const details = { nested: { value: 1 } };
  StepInfoRecord.create({ id: "s", type: "web", details });
  assert.equal(Object.isFrozen(details.nested), false);
});

test("advisories flag values outside the typical ranges", () => {
  const plan: ResearchPlan = {
    search_queries: [{ ...QUERY, source: "web", priority: 9 }],
    required_analyses: [{ type: "SWOT", description: "d", importance: 0 }],
  };
  const advisories = collectAdvisories("ResearchPlan", ResearchPlanRecord.create(plan));
  assert.deepEqual(advisories, [
    {
      path: "search_queries.0.priority",
      message: "priority 9 is outside the usual range 2-4",
      value: 9,
    },
    {
      path: "required_analyses.0.importance",
      message: "importance 0 is outside the usual range 1-5",
      value: 0,
    },
  ]);
});

test("advisories reach into stream updates", () => {
  const update = StreamUpdateRecord.create({
    data: {
      ...RUNNING_WEB_DATA,
      type: "analysis",
      status: "completed",
      analysisType: "gaps",
      recommendations: [{ action: "a", rationale: "r", priority: 11 }],
    },
  });
  const advisories = collectAdvisories("StreamUpdate", update);
  assert.equal(advisories.length, 1);
  assert.equal(advisories[0]?.path, "data.recommendations.0.priority");
});

test("in-range records produce no advisories", () => {
  assert.deepEqual(collectAdvisories("FinalSynthesisResult", FinalSynthesisResultRecord.create(SYNTHESIS)), []);
  assert.deepEqual(collectAdvisories("GapAnalysisResult", GapAnalysisResultRecord.create(GAP_ANALYSIS)), []);
});

test("duplicate step ids are reported with both positions", () => {
  const steps: StepInfo[] = [
    { id: "search-0-web", type: "web", details: {} },
    { id: "analysis-0", type: "analysis", details: {} },
    { id: "search-0-web", type: "web", details: {} },
  ];
  assert.deepEqual(findDuplicateStepIds(steps), [
    { id: "search-0-web", firstIndex: 0, duplicateIndex: 2 },
  ]);
});

test("registry lists all sixteen record types", () => {
  assert.equal(RECORD_NAMES.length, 16);
  assert.ok(isRecordName("KnowledgeGap"));
  assert.equal(isRecordName("toString"), false);
  assert.equal(RECORD_TYPES.RecommendedFollowup.name, "RecommendedFollowup");
});

// ═══════════════════════════════════════════════════════════════════════════
// SUMMARY
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n═══════════════════════════════════════════════`);
console.log(`  Results: ${passed} passed, ${failed} failed`);
console.log(`═══════════════════════════════════════════════\n`);

if (failed > 0) {
  process.exit(1);
}
