/**
 * Option inspection tests.
 *
 * Run: node --import tsx src/config/pipeline/options.test.ts
 */

import { strict as assert } from "node:assert";
import { parsePipelineConfig } from "./loader.js";
import { inspectOptions } from "./options.js";

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

function warningsFor(text: string) {
  return inspectOptions(parsePipelineConfig(text, "test.config", { env: {} }));
}

section("Well-formed options");

test("defaults produce no warnings", () => {
  assert.deepEqual(warningsFor(""), []);
});

test("typical analysis options produce no warnings", () => {
  const warnings = warningsFor(
    [
      "window=500000",
      "correlationThreshold=0.7",
      "pValueThreshold=0.05",
      "qValueThreshold=1",
      "correlationMethod=spearman",
      "figures=y",
      "figureWidth=1000000",
      "zoom=100000",
      "tracks=y",
    ].join("\n")
  );
  assert.deepEqual(warnings, []);
});

section("Malformed options");

test("non-numeric window is reported with its value", () => {
  assert.deepEqual(warningsFor("window=wide\n"), [
    { option: "window", value: "wide", message: "must be a positive integer" },
  ]);
});

test("zero is not a positive integer", () => {
  assert.deepEqual(warningsFor("zoom=0\n"), [
    { option: "zoom", value: "0", message: "must be a positive integer" },
  ]);
});

test("thresholds outside [0, 1] are reported", () => {
  assert.deepEqual(warningsFor("pValueThreshold=1.5\n"), [
    { option: "pValueThreshold", value: "1.5", message: "must be a number between 0 and 1" },
  ]);
});

test("unknown correlation method and tracks spelling are reported in listing order", () => {
  const warnings = warningsFor("correlationMethod=cosine\ntracks=yes\n");
  assert.deepEqual(
    warnings.map((w) => [w.option, w.value]),
    [
      ["tracks", "yes"],
      ["correlationMethod", "cosine"],
    ]
  );
});

console.log(`\nResults: ${passed} passed, ${failed} failed`);

if (failed > 0) {
  process.exit(1);
}
