/**
 * Track merging after dispatch.
 *
 * Requires the DispatchReport, which exists only once every unit has
 * finished. The merge is launched exactly when tracks=y and runs over
 * whatever the units produced; failed samples simply contribute nothing.
 */

import { existsSync } from "node:fs";
import { join } from "node:path";
import type { PipelineConfig } from "../config/index.js";
import type { Logger } from "../logging/index.js";
import type { ResolvedRun } from "../modes/index.js";
import { UnitStatus, type AggregationResult, type DispatchReport } from "../types/index.js";
import type { CommandRunner } from "./runner.js";

export const ANCHORS_FILE = "anchors.bed";
export const MERGE_LOG_FILE = "merge-tracks.log";

export interface AggregationOptions {
  runner: CommandRunner;
  mergeCommand: string;
  logger?: Logger;
}

export function anchorsPath(config: Readonly<PipelineConfig>): string {
  return join(config.outDirectory, ANCHORS_FILE);
}

export function shouldMergeTracks(config: Readonly<PipelineConfig>): boolean {
  return config.tracks === "y";
}

/**
 * Arguments of the merge command: anchors file, output directory, the file
 * that enumerates the samples, assembly.
 */
export function mergeArgs(run: ResolvedRun): string[] {
  const { config, mode } = run;
  const samplesSource = mode.kind === "singleSample" ? config.sourcePath : mode.listPath;
  return [anchorsPath(config), config.outDirectory, samplesSource, config.assembly];
}

export async function triggerAggregation(
  run: ResolvedRun,
  report: DispatchReport,
  options: AggregationOptions
): Promise<AggregationResult> {
  const { logger } = options;

  if (!shouldMergeTracks(run.config)) {
    logger?.debug("Track merging not requested", { tracks: run.config.tracks });
    return { status: UnitStatus.Skipped, exitCode: null, reason: "tracks not requested" };
  }

  // The merge tool decides what a missing anchors file means
  const anchors = anchorsPath(run.config);
  if (!existsSync(anchors)) {
    logger?.warn("Anchors file not found before merging", { anchors });
  }

  logger?.info("Merging tracks", {
    samples: report.totalSamples,
    failedSamples: report.failed,
    assembly: run.config.assembly,
  });

  const outcome = await options.runner.run({
    command: options.mergeCommand,
    args: mergeArgs(run),
    logFile: join(run.config.outDirectory, MERGE_LOG_FILE),
  });

  if (outcome.exitCode === 0 && outcome.error === undefined) {
    logger?.info("Tracks merged", { durationMs: outcome.durationMs });
    return { status: UnitStatus.Completed, exitCode: 0 };
  }

  const reason = outcome.error ?? `exited with code ${outcome.exitCode}`;
  logger?.error("Track merging failed", { reason });
  return { status: UnitStatus.Failed, exitCode: outcome.exitCode, reason };
}
