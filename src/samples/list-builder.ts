/**
 * Sample list parsing for the multi-sample modes.
 *
 * File formats (fixed by the analysis tools that also read them):
 *   matrix list:    <matrixPath> <sampleName>      space-delimited
 *   reference list: <referencePath>\t<sampleName>  tab-delimited
 *
 * The builder never throws. A missing file yields no samples and a
 * MissingFileError on the result; a short line yields a sample whose missing
 * fields are "" and which carries a MalformedListEntryError.
 */

import { readFileSync } from "node:fs";
import { MalformedListEntryError, MissingFileError } from "../errors/index.js";
import type { MultiSampleMode, SampleSpec } from "../types/index.js";

export interface SampleList {
  readonly listPath: string;
  readonly samples: readonly SampleSpec[];
  readonly missingFile?: MissingFileError;
}

/**
 * Split one list line into fields using the delimiter of the mode.
 */
export function splitListLine(kind: MultiSampleMode["kind"], line: string): string[] {
  if (kind === "referenceList") {
    return line.split("\t");
  }
  return line.split(" ").filter((field) => field !== "");
}

function describeProblem(inputPath: string, sampleName: string): string | null {
  if (inputPath === "" && sampleName === "") {
    return "missing input path and sample name";
  }
  if (inputPath === "") {
    return "missing input path";
  }
  if (sampleName === "") {
    return "missing sample name";
  }
  return null;
}

/**
 * Parse list-file text into ordered samples with 1-based ordinals.
 * Blank lines are skipped and take no ordinal.
 */
export function parseSampleList(
  kind: MultiSampleMode["kind"],
  text: string,
  listPath: string
): SampleSpec[] {
  const entries: Array<{ lineNumber: number; fields: string[] }> = [];

  const lines = text.split("\n");
  for (let i = 0; i < lines.length; i++) {
    const line = (lines[i] ?? "").replace(/\r$/, "");
    if (line.trim() === "") {
      continue;
    }
    entries.push({ lineNumber: i + 1, fields: splitListLine(kind, line) });
  }

  const total = entries.length;
  return entries.map(({ lineNumber, fields }, index): SampleSpec => {
    const inputPath = fields[0] ?? "";
    const sampleName = fields[1] ?? "";
    const problem = describeProblem(inputPath, sampleName);

    return {
      inputPath,
      sampleName,
      ordinalIndex: index + 1,
      totalSamples: total,
      lineNumber,
      ...(problem ? { issue: new MalformedListEntryError(listPath, lineNumber, problem) } : {}),
    };
  });
}

/**
 * Read the list file named by a multi-sample mode.
 */
export function buildSampleList(mode: MultiSampleMode): SampleList {
  let text: string;
  try {
    text = readFileSync(mode.listPath, "utf-8");
  } catch (err) {
    return {
      listPath: mode.listPath,
      samples: [],
      missingFile: new MissingFileError(
        mode.listPath,
        err instanceof Error ? err.message : String(err)
      ),
    };
  }

  return {
    listPath: mode.listPath,
    samples: parseSampleList(mode.kind, text, mode.listPath),
  };
}
