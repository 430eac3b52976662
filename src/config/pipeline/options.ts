/**
 * Well-formedness checks for the analysis options the dispatch core passes
 * through untouched. Problems are warnings: the analysis step owns these
 * options and may accept more than is checked here.
 */

import { z } from "zod";
import { CorrelationMethod, YesNo, type ConfigKey } from "./enums.js";
import type { PipelineConfig } from "./schema.js";

const PositiveInteger = z
  .string()
  .regex(/^\d+$/, "must be a positive integer")
  .refine((value) => parseInt(value, 10) > 0, "must be a positive integer");

const Probability = z
  .string()
  .refine((value) => {
    const n = Number(value);
    return value.trim() !== "" && Number.isFinite(n) && n >= 0 && n <= 1;
  }, "must be a number between 0 and 1");

const OPTION_RULES: ReadonlyArray<readonly [ConfigKey, z.ZodType<string>]> = [
  ["tracks", YesNo],
  ["window", PositiveInteger],
  ["correlationThreshold", Probability],
  ["pValueThreshold", Probability],
  ["qValueThreshold", Probability],
  ["correlationMethod", CorrelationMethod],
  ["figures", YesNo],
  ["figureWidth", PositiveInteger],
  ["zoom", PositiveInteger],
];

export interface OptionWarning {
  option: ConfigKey;
  value: string;
  message: string;
}

/**
 * Check every set option that has a rule. Empty options are not checked.
 */
export function inspectOptions(config: Readonly<PipelineConfig>): OptionWarning[] {
  const warnings: OptionWarning[] = [];

  for (const [key, rule] of OPTION_RULES) {
    const value = config[key];
    if (value === "") {
      continue;
    }

    const result = rule.safeParse(value);
    if (!result.success) {
      warnings.push({
        option: key,
        value,
        message: result.error.issues[0]?.message ?? "invalid value",
      });
    }
  }

  return warnings;
}
