/**
 * Turning samples into analysis invocations.
 */

import { basename, join } from "node:path";
import { MalformedListEntryError } from "../errors/index.js";
import type { PipelineConfig } from "../config/index.js";
import type { ResolvedRun } from "../modes/index.js";
import type {
  AnalysisInvocation,
  InputFlag,
  MultiSampleMode,
  PlannedUnit,
  SampleSpec,
} from "../types/index.js";

const INPUT_FLAGS: Readonly<Record<MultiSampleMode["kind"], InputFlag>> = {
  matrixList: "-matrix",
  referenceList: "-ref",
};

/**
 * Why a sample name cannot serve as a directory of its own under
 * outDirectory, or null when it can.
 */
export function sampleNameProblem(sampleName: string): string | null {
  if (sampleName === "." || sampleName === "..") {
    return `sample name "${sampleName}" does not name its own directory`;
  }
  if (sampleName.includes("/")) {
    return `sample name "${sampleName}" must not contain "/"`;
  }
  return null;
}

/**
 * One unit per sample. Output directories are `outDirectory/sampleName`;
 * a sample whose directory repeats an earlier one is not launchable.
 */
export function planMultiSampleUnits(
  config: Readonly<PipelineConfig>,
  mode: MultiSampleMode,
  samples: readonly SampleSpec[]
): PlannedUnit[] {
  const flag = INPUT_FLAGS[mode.kind];
  const firstLine = new Map<string, number>();

  return samples.map((sample, index): PlannedUnit => {
    const invocation: AnalysisInvocation = {
      configPath: config.sourcePath,
      sampleName: sample.sampleName,
      outputDirectory: join(config.outDirectory, sample.sampleName),
      input: { flag, path: sample.inputPath },
      ordinalIndex: index + 1,
      totalSamples: samples.length,
    };

    if (sample.issue) {
      return { invocation, issue: sample.issue };
    }

    const lineNumber = sample.lineNumber ?? index + 1;
    const problem = sampleNameProblem(sample.sampleName);
    if (problem) {
      return { invocation, issue: new MalformedListEntryError(mode.listPath, lineNumber, problem) };
    }

    const earlier = firstLine.get(invocation.outputDirectory);
    if (earlier !== undefined) {
      return {
        invocation,
        issue: new MalformedListEntryError(
          mode.listPath,
          lineNumber,
          `sample name "${sample.sampleName}" already used on line ${earlier}`
        ),
      };
    }

    firstLine.set(invocation.outputDirectory, lineNumber);
    return { invocation };
  });
}

/**
 * The implicit single sample. The analysis reads its input keys from the
 * configuration file itself, so only the output directory is derived here.
 */
export function planSingleSampleUnit(config: Readonly<PipelineConfig>): PlannedUnit {
  return {
    invocation: {
      configPath: config.sourcePath,
      sampleName: basename(config.outDirectory),
      outputDirectory: config.outDirectory,
    },
  };
}

export function planUnits(run: ResolvedRun, samples: readonly SampleSpec[]): PlannedUnit[] {
  switch (run.mode.kind) {
    case "matrixList":
    case "referenceList":
      return planMultiSampleUnits(run.config, run.mode, samples);
    case "singleSample":
      return [planSingleSampleUnit(run.config)];
  }
}

/**
 * Arguments of the single-sample analysis command, config path first.
 */
export function analysisArgs(invocation: AnalysisInvocation): string[] {
  const args = [invocation.configPath];
  if (invocation.input) {
    args.push(invocation.input.flag, invocation.input.path);
  }
  if (invocation.ordinalIndex === undefined || invocation.totalSamples === undefined) {
    return args;
  }
  args.push(
    "-out",
    invocation.outputDirectory,
    "-sample",
    invocation.sampleName,
    "-track",
    String(invocation.ordinalIndex),
    "-numSamples",
    String(invocation.totalSamples)
  );
  return args;
}
