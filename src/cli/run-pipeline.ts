#!/usr/bin/env node
/**
 * CLI entry point: run every sample of a configuration, then merge tracks.
 *
 * Usage:
 *   run-pipeline <config file> [options]
 *   npm run pipeline -- run.config --dry-run
 *
 * Options:
 *   --dry-run     Print the commands the run would execute; launch nothing
 *   --json        Print the plan or the run report as JSON
 *   -help, --help, -h
 *                 Show usage and every configuration option
 *
 * Exit codes:
 *   0 - Every sample (and the merge, when requested) succeeded
 *   1 - Help shown, bad arguments, or an invalid configuration
 *   2 - The run finished but a sample or the merge failed
 */

import { realpathSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { parseArgs } from "node:util";

import {
  CONFIG_KEYS,
  CONFIG_KEY_DESCRIPTIONS,
  DEFAULT_OPTION_VALUES,
  SettingsError,
  loadSettings,
  type AppSettings,
} from "../config/index.js";
import { PipelineError } from "../errors/index.js";
import { createLogger, initRunId, type Logger } from "../logging/index.js";
import { ProcessRunner } from "../dispatch/index.js";
import {
  describePlan,
  executePlan,
  hasFailures,
  planPipeline,
  type PipelineOutcome,
  type PipelinePlan,
} from "../pipeline/index.js";

export const EXIT_OK = 0;
export const EXIT_INVALID = 1;
export const EXIT_UNIT_FAILED = 2;

// ============================================================
// CLI Parsing
// ============================================================

export const USAGE = "Usage: run-pipeline <config file> [--dry-run] [--json] [-help]";

/**
 * Usage text followed by every recognized configuration option.
 */
export function formatHelp(): string {
  const width = Math.max(...CONFIG_KEYS.map((key) => key.length));
  const lines = [
    USAGE,
    "",
    "Runs the single-sample analysis once per sample listed in the configuration,",
    "then merges browser tracks when tracks=y.",
    "",
    "Options:",
    "  --dry-run   Print the commands the run would execute; launch nothing",
    "  --json      Print the plan or the run report as JSON",
    "  -help       Show this message",
    "",
    "Configuration options (key=value, one per line):",
  ];

  for (const key of CONFIG_KEYS) {
    const fallback = DEFAULT_OPTION_VALUES[key];
    const suffix = fallback === "" ? "" : ` [default: ${fallback}]`;
    lines.push(`  ${key.padEnd(width)}  ${CONFIG_KEY_DESCRIPTIONS[key]}${suffix}`);
  }

  lines.push("", 'Lines of the form "module load <name>..." load environment modules for each sample.');
  return lines.join("\n");
}

export interface CliArgs {
  configPath?: string;
  help: boolean;
  dryRun: boolean;
  json: boolean;
}

/**
 * Parse arguments. The single-dash `-help` spelling is accepted.
 */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  const args = argv.map((arg) => (arg === "-help" ? "--help" : arg));
  const { values, positionals } = parseArgs({
    args,
    allowPositionals: true,
    options: {
      help: { type: "boolean", short: "h", default: false },
      "dry-run": { type: "boolean", default: false },
      json: { type: "boolean", default: false },
    },
  });

  if (positionals.length > 1) {
    throw new TypeError(`Expected one config file, got ${positionals.length}`);
  }

  return {
    configPath: positionals[0],
    help: values.help ?? false,
    dryRun: values["dry-run"] ?? false,
    json: values.json ?? false,
  };
}

// ============================================================
// Output
// ============================================================

function printPlan(plan: PipelinePlan, settings: AppSettings, json: boolean): void {
  const commands = describePlan(plan, settings);

  if (json) {
    console.log(
      JSON.stringify(
        {
          app: settings.appName,
          mode: plan.run.mode.kind,
          units: plan.units.map((unit) => ({
            ...unit.invocation,
            issue: unit.issue?.message,
          })),
          commands,
          warnings: plan.warnings,
        },
        null,
        2
      )
    );
    return;
  }

  for (const unit of plan.units) {
    if (unit.issue) {
      console.log(`# not launched: ${unit.issue.message}`);
    }
  }
  for (const line of commands) {
    console.log(line);
  }
}

function printOutcome(
  outcome: PipelineOutcome,
  settings: AppSettings,
  runId: string,
  json: boolean
): void {
  const { report, aggregation } = outcome;

  if (json) {
    console.log(
      JSON.stringify(
        {
          app: settings.appName,
          runId,
          mode: outcome.plan.run.mode.kind,
          totalSamples: report.totalSamples,
          completed: report.completed,
          failed: report.failed,
          units: report.units.map((unit) => ({
            sample: unit.invocation.sampleName,
            track: unit.invocation.ordinalIndex,
            outputDirectory: unit.invocation.outputDirectory,
            status: unit.status,
            exitCode: unit.exitCode,
            error: unit.error,
          })),
          aggregation,
        },
        null,
        2
      )
    );
    return;
  }

  console.log(
    `Samples: ${report.totalSamples} total, ${report.completed} completed, ${report.failed} failed`
  );
  for (const unit of report.units) {
    if (unit.error) {
      console.log(`  ${unit.invocation.sampleName || "(unnamed)"}: ${unit.error}`);
    }
  }
  const reason = aggregation.reason ? ` (${aggregation.reason})` : "";
  console.log(`Track merging: ${aggregation.status}${reason}`);
}

// ============================================================
// Main
// ============================================================

export async function main(argv: readonly string[] = process.argv.slice(2)): Promise<number> {
  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (err) {
    console.log(err instanceof Error ? err.message : String(err));
    console.log(USAGE);
    return EXIT_INVALID;
  }

  if (args.help) {
    console.log(formatHelp());
    return EXIT_INVALID;
  }

  if (!args.configPath) {
    console.log(USAGE);
    return EXIT_INVALID;
  }

  let settings: AppSettings;
  let plan: PipelinePlan;
  try {
    settings = loadSettings();
    plan = planPipeline(args.configPath);
  } catch (err) {
    if (err instanceof PipelineError) {
      console.log(err.format());
      return EXIT_INVALID;
    }
    if (err instanceof SettingsError) {
      console.log(`SettingsError: ${err.message}`);
      return EXIT_INVALID;
    }
    throw err;
  }

  const runId = initRunId();
  const { config } = plan.run;
  const logger: Logger = createLogger({
    level: settings.logLevel,
    logDir: join(config.outDirectory, "logs"),
    file: settings.logToFile && !args.dryRun,
    console: !args.json,
  });

  logger.info("Configuration loaded", {
    app: settings.appName,
    environment: settings.env,
    config: config.sourcePath,
    mode: plan.run.mode.kind,
    samples: plan.units.length,
    assembly: config.assembly,
    modules: config.moduleDirectives,
  });
  for (const warning of plan.warnings) {
    logger.warn("Option value looks malformed", { ...warning });
  }

  if (args.dryRun) {
    printPlan(plan, settings, args.json);
    return EXIT_OK;
  }

  const outcome = await executePlan(plan, {
    runner: new ProcessRunner({
      modules: config.moduleDirectives,
      moduleShell: settings.moduleShell,
    }),
    analysisCommand: settings.analysisCommand,
    mergeCommand: settings.mergeCommand,
    maxParallel: settings.maxParallel,
    logger,
  });

  printOutcome(outcome, settings, runId, args.json);
  return hasFailures(outcome) ? EXIT_UNIT_FAILED : EXIT_OK;
}

/**
 * True when this module is the program entry point, including through the
 * symlink npm installs for the bin.
 */
function isDirectExecution(): boolean {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }
  try {
    return realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

// Only run when executed directly (not imported by tests)
if (isDirectExecution()) {
  main()
    .then((code) => process.exit(code))
    .catch((err: unknown) => {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`Error: ${message}`);
      process.exit(1);
    });
}
