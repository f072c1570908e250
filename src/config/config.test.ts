/**
 * Configuration tests.
 *
 * Run: node --import tsx src/config/config.test.ts
 */

import { strict as assert } from "node:assert";

import { ConfigError, loadAppConfig } from "./index.js";
import { optionalEnv, optionalEnvBool } from "./env.js";

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

// ============================================================
// Env readers
// ============================================================

section("Env readers");

test("optionalEnv falls back on missing and empty values", () => {
  assert.equal(optionalEnv({}, "APP_NAME", "fallback"), "fallback");
  assert.equal(optionalEnv({ APP_NAME: "" }, "APP_NAME", "fallback"), "fallback");
  assert.equal(optionalEnv({ APP_NAME: "custom" }, "APP_NAME", "fallback"), "custom");
});

test("optionalEnvBool accepts the documented spellings", () => {
  for (const value of ["true", "1", "yes", "TRUE", "Yes"]) {
    assert.equal(optionalEnvBool({ FLAG: value }, "FLAG", false), true);
  }
  for (const value of ["false", "0", "no", "NO"]) {
    assert.equal(optionalEnvBool({ FLAG: value }, "FLAG", true), false);
  }
  assert.equal(optionalEnvBool({}, "FLAG", true), true);
});

test("optionalEnvBool rejects anything else", () => {
  assert.throws(
    () => optionalEnvBool({ FLAG: "maybe" }, "FLAG", false),
    (err: unknown) =>
      err instanceof ConfigError &&
      err.message === "Environment variable FLAG must be a boolean (true/false/1/0/yes/no), got: maybe"
  );
});

// ============================================================
// loadAppConfig
// ============================================================

section("loadAppConfig");

test("defaults apply to an empty environment", () => {
  assert.deepEqual(loadAppConfig({}), {
    env: "development",
    logLevel: "info",
    appName: "research-stream-schemas",
    logDir: "output/logs",
    logToFile: false,
    strictParsing: false,
  });
});

test("environment values override defaults", () => {
  const config = loadAppConfig({
    NODE_ENV: "test",
    LOG_LEVEL: "debug",
    APP_NAME: "payload-checker",
    LOG_DIR: "/tmp/logs",
    LOG_TO_FILE: "1",
    SCHEMA_STRICT_PARSING: "yes",
  });
  assert.equal(config.env, "test");
  assert.equal(config.logLevel, "debug");
  assert.equal(config.appName, "payload-checker");
  assert.equal(config.logDir, "/tmp/logs");
  assert.equal(config.logToFile, true);
  assert.equal(config.strictParsing, true);
});

test("loaded configuration is frozen", () => {
  assert.ok(Object.isFrozen(loadAppConfig({})));
});

test("unknown log level fails fast", () => {
  assert.throws(
    () => loadAppConfig({ LOG_LEVEL: "verbose" }),
    (err: unknown) => err instanceof ConfigError && err.message.startsWith("Invalid configuration: logLevel: ")
  );
});

test("unknown environment fails fast", () => {
  assert.throws(
    () => loadAppConfig({ NODE_ENV: "staging" }),
    (err: unknown) => err instanceof ConfigError && err.message.startsWith("Invalid configuration: env: ")
  );
});

test("malformed boolean fails fast", () => {
  assert.throws(() => loadAppConfig({ SCHEMA_STRICT_PARSING: "sometimes" }), ConfigError);
});

// ============================================================
// Summary
// ============================================================

console.log(`\n${passed} passed, ${failed} failed`);

if (failed > 0) {
  process.exit(1);
}
