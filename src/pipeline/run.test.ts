/**
 * Whole-run tests: planning from a file, execution order, dry-run commands.
 *
 * Run: node --import tsx src/pipeline/run.test.ts
 */

import { strict as assert } from "node:assert";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import { MissingFileError, ValidationError } from "../errors/index.js";
import type { CommandOutcome, CommandRunner, CommandSpec } from "../dispatch/index.js";
import { UnitStatus } from "../types/index.js";
import { describePlan, executePlan, hasFailures, planPipeline } from "./run.js";

let passed = 0;
let failed = 0;

async function test(name: string, fn: () => void | Promise<void>): Promise<void> {
  try {
    await fn();
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

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

const COMMANDS = { analysisCommand: "analyse", mergeCommand: "merge" };

const dir = mkdtempSync(join(tmpdir(), "dispatch-run-"));

function writeConfig(name: string, lines: string[]): string {
  const path = join(dir, name);
  writeFileSync(path, lines.join("\n") + "\n");
  return path;
}

try {
  section("Planning");

  await test("reference + db without lists plans one single-sample unit", () => {
    const configPath = writeConfig("single.config", [
      "reference=ref.bed",
      "db=db.txt",
      "anchor=a.bed",
      "outDirectory=/tmp/out",
    ]);
    const plan = planPipeline(configPath, { env: {} });

    assert.equal(plan.run.mode.kind, "singleSample");
    assert.equal(plan.units.length, 1);
    assert.equal(plan.sampleList, undefined);
    assert.deepEqual(plan.units[0]?.invocation, {
      configPath,
      sampleName: "out",
      outputDirectory: "/tmp/out",
    });
    assert.deepEqual(describePlan(plan, COMMANDS), [`analyse ${configPath}`]);
  });

  await test("matrix list plans one unit per line and the merge", () => {
    const listPath = join(dir, "matrices.txt");
    writeFileSync(listPath, "m1.txt A\nm2.txt B\n");
    const configPath = writeConfig("multi.config", [
      "anchor=a.bed",
      "outDirectory=/out",
      `matrices=${listPath}`,
      "tracks=y",
      "window=wide",
    ]);
    const plan = planPipeline(configPath, { env: {} });

    assert.equal(plan.units.length, 2);
    assert.equal(plan.sampleList?.listPath, listPath);
    assert.deepEqual(
      plan.warnings.map((w) => w.option),
      ["window"]
    );
    assert.deepEqual(describePlan(plan, COMMANDS), [
      `analyse ${configPath} -matrix m1.txt -out /out/A -sample A -track 1 -numSamples 2`,
      `analyse ${configPath} -matrix m2.txt -out /out/B -sample B -track 2 -numSamples 2`,
      `merge /out/anchors.bed /out ${listPath} hg19`,
    ]);
  });

  await test("unreadable sample list is fatal", () => {
    const configPath = writeConfig("nolist.config", [
      "anchor=a.bed",
      "outDirectory=/out",
      `matrices=${join(dir, "absent.txt")}`,
    ]);
    assert.throws(() => planPipeline(configPath, { env: {} }), MissingFileError);
  });

  await test("sample list without samples is fatal", () => {
    const listPath = join(dir, "empty.txt");
    writeFileSync(listPath, "\n\n");
    const configPath = writeConfig("empty.config", [
      "anchor=a.bed",
      "outDirectory=/out",
      `references=${listPath}`,
      "db=db.txt",
    ]);
    assert.throws(
      () => planPipeline(configPath, { env: {} }),
      (err: unknown) =>
        err instanceof ValidationError &&
        err.message === `${listPath} lists no samples` &&
        err.fields[0] === "references"
    );
  });

  section("Execution");

  await test("merging starts only after every sample unit has finished", async () => {
    const out = join(dir, "ordered");
    const listPath = join(dir, "ordered.txt");
    writeFileSync(listPath, "m1.txt A\nm2.txt B\nm3.txt C\n");
    const configPath = writeConfig("ordered.config", [
      "anchor=a.bed",
      `outDirectory=${out}`,
      `matrices=${listPath}`,
      "tracks=y",
    ]);

    const events: string[] = [];
    const runner: CommandRunner = {
      async run(spec: CommandSpec): Promise<CommandOutcome> {
        if (spec.command === "merge") {
          events.push("merge");
          return { exitCode: 0, durationMs: 1 };
        }
        const sample = spec.args[spec.args.indexOf("-sample") + 1] ?? "";
        events.push(`start ${sample}`);
        await delay(sample === "B" ? 40 : 5);
        writeFileSync(join(out, "anchors.bed"), "chr1\t1\t2\n");
        events.push(`end ${sample}`);
        return { exitCode: 0, durationMs: 1 };
      },
    };

    const outcome = await executePlan(planPipeline(configPath, { env: {} }), {
      ...COMMANDS,
      runner,
    });

    assert.equal(events.length, 7);
    assert.equal(events[6], "merge");
    assert.equal(events.filter((e) => e.startsWith("start")).length, 3);
    assert.equal(outcome.report.completed, 3);
    assert.equal(outcome.aggregation.status, UnitStatus.Completed);
    assert.equal(hasFailures(outcome), false);
  });

  await test("single-sample execution launches exactly one unit with the config path", async () => {
    const out = join(dir, "single-out");
    const configPath = writeConfig("single-exec.config", [
      "reference=ref.bed",
      "db=db.txt",
      "anchor=a.bed",
      `outDirectory=${out}`,
    ]);
    const calls: CommandSpec[] = [];
    const runner: CommandRunner = {
      async run(spec) {
        calls.push(spec);
        return { exitCode: 0, durationMs: 1 };
      },
    };

    const outcome = await executePlan(planPipeline(configPath, { env: {} }), {
      ...COMMANDS,
      runner,
    });

    assert.deepEqual(calls, [
      { command: "analyse", args: [configPath], logFile: join(out, "analysis.log") },
    ]);
    assert.equal(outcome.aggregation.status, UnitStatus.Skipped);
  });

  await test("a failed sample makes the run report failures", async () => {
    const out = join(dir, "partial");
    const listPath = join(dir, "partial.txt");
    writeFileSync(listPath, "r1.bed\tA\nr2.bed\tB\n");
    const configPath = writeConfig("partial.config", [
      "anchor=a.bed",
      `outDirectory=${out}`,
      `references=${listPath}`,
      "db=db.txt",
    ]);
    const runner: CommandRunner = {
      async run(spec) {
        const failing = spec.args.includes("r2.bed");
        return failing
          ? { exitCode: 1, durationMs: 1, error: "analyse exited with code 1" }
          : { exitCode: 0, durationMs: 1 };
      },
    };

    const outcome = await executePlan(planPipeline(configPath, { env: {} }), {
      ...COMMANDS,
      runner,
    });
    assert.equal(outcome.report.failed, 1);
    assert.equal(hasFailures(outcome), true);
  });
} finally {
  rmSync(dir, { recursive: true, force: true });
}

console.log(`\nResults: ${passed} passed, ${failed} failed`);

if (failed > 0) {
  process.exit(1);
}
