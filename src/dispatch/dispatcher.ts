/**
 * Sample dispatch.
 *
 * Every unit is started without waiting for the previous one; the returned
 * promise settles only once all of them have finished. That settlement is
 * the synchronization point the merge step waits on.
 *
 * A unit that cannot be launched, or whose command fails, is recorded as
 * failed. It never stops its siblings and nothing is retried.
 */

import { mkdir } from "node:fs/promises";
import { join } from "node:path";
import type { Logger } from "../logging/index.js";
import {
  UnitStatus,
  type DispatchReport,
  type PlannedUnit,
  type UnitResult,
} from "../types/index.js";
import { analysisArgs } from "./invocation.js";
import type { CommandRunner } from "./runner.js";

export const ANALYSIS_LOG_FILE = "analysis.log";

export interface DispatchOptions {
  runner: CommandRunner;
  analysisCommand: string;
  /** Maximum units running at once; 0 or absent means no bound */
  maxParallel?: number;
  logger?: Logger;
}

type Limiter = <T>(task: () => Promise<T>) => Promise<T>;

/**
 * Run tasks with at most `max` in flight, starting queued ones in call order.
 */
function createLimiter(max: number): Limiter {
  let active = 0;
  const waiting: Array<() => void> = [];

  return async <T>(task: () => Promise<T>): Promise<T> => {
    if (max > 0 && active >= max) {
      await new Promise<void>((resolve) => waiting.push(resolve));
    }
    active++;
    try {
      return await task();
    } finally {
      active--;
      waiting.shift()?.();
    }
  };
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

async function runUnit(unit: PlannedUnit, options: DispatchOptions): Promise<UnitResult> {
  const { invocation } = unit;
  const logger = options.logger?.child({
    sample: invocation.sampleName,
    track: invocation.ordinalIndex,
  });

  if (unit.issue) {
    logger?.error("Sample not launched", { reason: unit.issue.message });
    return {
      invocation,
      status: UnitStatus.Failed,
      exitCode: null,
      durationMs: 0,
      error: unit.issue.message,
    };
  }

  const started = Date.now();
  try {
    await mkdir(invocation.outputDirectory, { recursive: true });
    logger?.info("Sample launched", { out: invocation.outputDirectory });

    const outcome = await options.runner.run({
      command: options.analysisCommand,
      args: analysisArgs(invocation),
      logFile: join(invocation.outputDirectory, ANALYSIS_LOG_FILE),
    });

    if (outcome.exitCode === 0 && outcome.error === undefined) {
      logger?.info("Sample completed", { durationMs: outcome.durationMs });
      return {
        invocation,
        status: UnitStatus.Completed,
        exitCode: 0,
        durationMs: outcome.durationMs,
      };
    }

    const error = outcome.error ?? `exited with code ${outcome.exitCode}`;
    logger?.error("Sample failed", { error, exitCode: outcome.exitCode });
    return {
      invocation,
      status: UnitStatus.Failed,
      exitCode: outcome.exitCode,
      durationMs: outcome.durationMs,
      error,
    };
  } catch (err) {
    const error = describeError(err);
    logger?.error("Sample failed", { error });
    return {
      invocation,
      status: UnitStatus.Failed,
      exitCode: null,
      durationMs: Date.now() - started,
      error,
    };
  }
}

/**
 * Launch one unit per planned sample and wait for all of them.
 */
export async function dispatchUnits(
  units: readonly PlannedUnit[],
  options: DispatchOptions
): Promise<DispatchReport> {
  const limit = createLimiter(options.maxParallel ?? 0);

  options.logger?.info("Dispatching samples", {
    samples: units.length,
    maxParallel: options.maxParallel ?? 0,
  });

  const pending = units.map((unit) => limit(() => runUnit(unit, options)));
  const results = await Promise.all(pending);

  const completed = results.filter((r) => r.status === UnitStatus.Completed).length;
  const report: DispatchReport = {
    units: results,
    totalSamples: units.length,
    completed,
    failed: results.length - completed,
  };

  options.logger?.info("All samples finished", {
    completed: report.completed,
    failed: report.failed,
  });
  return report;
}
