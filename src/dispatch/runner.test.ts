/**
 * Process runner tests.
 *
 * Run: node --import tsx src/dispatch/runner.test.ts
 *
 * The node binary running the tests stands in for the external tools.
 */

import { strict as assert } from "node:assert";
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import { ProcessRunner, formatCommandLine, wrapWithModules } from "./runner.js";

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

section("Command lines");

await test("module-free commands are spawned directly", () => {
  assert.deepEqual(wrapWithModules("sample-analysis", ["run.config"], [], "bash"), {
    file: "sample-analysis",
    args: ["run.config"],
  });
});

await test("modules are loaded by a login shell that execs the command", () => {
  assert.deepEqual(
    wrapWithModules("sample-analysis", ["run.config", "-sample", "A"], ["R/3.2.1", "bedtools"], "bash"),
    {
      file: "bash",
      args: [
        "-lc",
        'module load R/3.2.1 bedtools && exec "$0" "$@"',
        "sample-analysis",
        "run.config",
        "-sample",
        "A",
      ],
    }
  );
});

await test("formatted command lines quote only where needed", () => {
  assert.equal(
    formatCommandLine("sample-analysis", ["run.config", "-sample", "fetal liver", "it's", ""]),
    "sample-analysis run.config -sample 'fetal liver' 'it'\\''s' ''"
  );
});

section("Running processes");

const dir = mkdtempSync(join(tmpdir(), "dispatch-runner-"));
const runner = new ProcessRunner();

try {
  await test("stdout and stderr are written to the log file", async () => {
    const logFile = join(dir, "unit", "analysis.log");
    const outcome = await runner.run({
      command: process.execPath,
      args: ["-e", "console.log('to stdout'); console.error('to stderr')"],
      logFile,
    });
    assert.equal(outcome.exitCode, 0);
    assert.equal(outcome.error, undefined);
    assert.ok(outcome.durationMs >= 0);

    const lines = readFileSync(logFile, "utf-8").trim().split("\n").sort();
    assert.deepEqual(lines, ["to stderr", "to stdout"]);
  });

  await test("non-zero exit is reported with its code", async () => {
    const outcome = await runner.run({
      command: process.execPath,
      args: ["-e", "process.exit(3)"],
      logFile: join(dir, "exit.log"),
    });
    assert.equal(outcome.exitCode, 3);
    assert.equal(outcome.error, `${process.execPath} exited with code 3`);
  });

  await test("arguments reach the child unchanged", async () => {
    const logFile = join(dir, "args.log");
    await runner.run({
      command: process.execPath,
      args: ["-e", "console.log(JSON.stringify(process.argv.slice(1)))", "fetal liver", "track", "2"],
      logFile,
    });
    assert.deepEqual(JSON.parse(readFileSync(logFile, "utf-8")), ["fetal liver", "track", "2"]);
  });

  await test("a command that cannot start resolves as a failure", async () => {
    const outcome = await runner.run({
      command: join(dir, "no-such-tool"),
      args: [],
      logFile: join(dir, "missing.log"),
    });
    assert.notEqual(outcome.exitCode, 0);
    assert.ok(outcome.error?.includes("no-such-tool"));
  });

  await test("output is inherited when no log file is given", async () => {
    const outcome = await runner.run({ command: process.execPath, args: ["-e", ""] });
    assert.equal(outcome.exitCode, 0);
  });

  await test("an unwritable log does not settle the unit before the child exits", async () => {
    const logFile = join(dir, "log-is-a-directory");
    mkdirSync(logFile);
    const marker = join(dir, "child-finished");
    const script = [
      "console.log('working');",
      `setTimeout(() => require('fs').writeFileSync(${JSON.stringify(marker)}, 'done'), 300);`,
    ].join(" ");

    const outcome = await runner.run({ command: process.execPath, args: ["-e", script], logFile });

    assert.ok(existsSync(marker));
    assert.equal(outcome.exitCode, 0);
    assert.ok(outcome.durationMs >= 300);
    assert.ok(
      outcome.error?.startsWith(`log file ${logFile}: EISDIR`),
      `unexpected error: ${outcome.error}`
    );
  });
} finally {
  rmSync(dir, { recursive: true, force: true });
}

console.log(`\nResults: ${passed} passed, ${failed} failed`);

if (failed > 0) {
  process.exit(1);
}
