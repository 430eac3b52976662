/**
 * A whole run: configuration, mode, samples, dispatch, merge.
 *
 * Planning is synchronous and launches nothing, so a plan can be printed
 * (dry run) or handed to an external scheduler instead of being executed.
 */

import {
  loadPipelineConfig,
  inspectOptions,
  type LoadPipelineConfigOptions,
  type OptionWarning,
} from "../config/index.js";
import { ValidationError } from "../errors/index.js";
import type { Logger } from "../logging/index.js";
import { resolveMode, type ResolvedRun } from "../modes/index.js";
import { buildSampleList, type SampleList } from "../samples/index.js";
import {
  analysisArgs,
  dispatchUnits,
  formatCommandLine,
  mergeArgs,
  planUnits,
  shouldMergeTracks,
  triggerAggregation,
  type CommandRunner,
} from "../dispatch/index.js";
import {
  UnitStatus,
  type AggregationResult,
  type DispatchReport,
  type PlannedUnit,
} from "../types/index.js";

export interface PipelinePlan {
  readonly run: ResolvedRun;
  readonly units: readonly PlannedUnit[];
  /** Present for the multi-sample modes */
  readonly sampleList?: SampleList;
  readonly warnings: readonly OptionWarning[];
}

export interface PipelineOutcome {
  readonly plan: PipelinePlan;
  readonly report: DispatchReport;
  readonly aggregation: AggregationResult;
}

export interface ExecuteOptions {
  runner: CommandRunner;
  analysisCommand: string;
  mergeCommand: string;
  maxParallel?: number;
  logger?: Logger;
}

/**
 * Load, resolve and plan a run from a configuration file.
 *
 * @throws MissingFileError if the configuration or sample list cannot be read
 * @throws ValidationError if required fields are missing or the list is empty
 */
export function planPipeline(
  configPath: string,
  options: LoadPipelineConfigOptions = {}
): PipelinePlan {
  const run = resolveMode(loadPipelineConfig(configPath, options));
  const warnings = inspectOptions(run.config);

  if (run.mode.kind === "singleSample") {
    return { run, units: planUnits(run, []), warnings };
  }

  const sampleList = buildSampleList(run.mode);
  if (sampleList.missingFile) {
    throw sampleList.missingFile;
  }
  if (sampleList.samples.length === 0) {
    const key = run.mode.kind === "matrixList" ? "matrices" : "references";
    throw new ValidationError(`${sampleList.listPath} lists no samples`, [key]);
  }

  return { run, units: planUnits(run, sampleList.samples), sampleList, warnings };
}

/**
 * Command lines the plan would run, in launch order; the merge comes last.
 */
export function describePlan(
  plan: PipelinePlan,
  commands: { analysisCommand: string; mergeCommand: string }
): string[] {
  const lines = plan.units
    .filter((unit) => !unit.issue)
    .map((unit) => formatCommandLine(commands.analysisCommand, analysisArgs(unit.invocation)));

  if (shouldMergeTracks(plan.run.config)) {
    lines.push(formatCommandLine(commands.mergeCommand, mergeArgs(plan.run)));
  }
  return lines;
}

/**
 * Dispatch every unit, wait for all, then merge when requested.
 */
export async function executePlan(
  plan: PipelinePlan,
  options: ExecuteOptions
): Promise<PipelineOutcome> {
  const report = await dispatchUnits(plan.units, {
    runner: options.runner,
    analysisCommand: options.analysisCommand,
    maxParallel: options.maxParallel,
    logger: options.logger,
  });

  const aggregation = await triggerAggregation(plan.run, report, {
    runner: options.runner,
    mergeCommand: options.mergeCommand,
    logger: options.logger,
  });

  return { plan, report, aggregation };
}

/**
 * True when any unit or the merge failed.
 */
export function hasFailures(outcome: PipelineOutcome): boolean {
  return outcome.report.failed > 0 || outcome.aggregation.status === UnitStatus.Failed;
}
