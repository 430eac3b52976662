/**
 * Sample, invocation and outcome definitions.
 * One sample becomes one invocation becomes one unit of work.
 */

import type { MalformedListEntryError } from "../errors/index.js";

export enum UnitStatus {
  Completed = "completed",
  Failed = "failed",
  Skipped = "skipped",
}

export interface SampleSpec {
  readonly inputPath: string;
  readonly sampleName: string;
  /** 1-based position in the list; absent for a single-sample run */
  readonly ordinalIndex?: number;
  readonly totalSamples?: number;
  /** List-file line the sample came from */
  readonly lineNumber?: number;
  /** Set when the line cannot produce a launchable unit */
  readonly issue?: MalformedListEntryError;
}

export type InputFlag = "-matrix" | "-ref";

export interface AnalysisInvocation {
  readonly configPath: string;
  readonly sampleName: string;
  readonly outputDirectory: string;
  /** Present only for multi-sample runs */
  readonly input?: { readonly flag: InputFlag; readonly path: string };
  readonly ordinalIndex?: number;
  readonly totalSamples?: number;
}

/**
 * A prepared unit: the invocation plus the reason it must not be launched, if any.
 */
export interface PlannedUnit {
  readonly invocation: AnalysisInvocation;
  readonly issue?: MalformedListEntryError;
}

export interface UnitResult {
  readonly invocation: AnalysisInvocation;
  readonly status: UnitStatus.Completed | UnitStatus.Failed;
  /** Process exit code; null when the unit never ran or was killed by a signal */
  readonly exitCode: number | null;
  readonly durationMs: number;
  readonly error?: string;
}

export interface DispatchReport {
  readonly units: readonly UnitResult[];
  readonly totalSamples: number;
  readonly completed: number;
  readonly failed: number;
}

export interface AggregationResult {
  readonly status: UnitStatus;
  readonly exitCode: number | null;
  readonly reason?: string;
}
