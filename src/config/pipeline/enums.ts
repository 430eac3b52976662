/**
 * Option names and enumerated values of the pipeline configuration file.
 */

import { z } from "zod";

/**
 * Every option the configuration file recognizes, in help-listing order.
 * Keys outside this list are kept but not used by the dispatch core.
 */
export const CONFIG_KEYS = [
  "reference",
  "db",
  "anchor",
  "outDirectory",
  "matrix",
  "references",
  "matrices",
  "tracks",
  "assembly",
  "window",
  "correlationThreshold",
  "pValueThreshold",
  "qValueThreshold",
  "correlationMethod",
  "figures",
  "figureWidth",
  "zoom",
  "colours",
] as const;
export type ConfigKey = (typeof CONFIG_KEYS)[number];

export function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((known) => known === key);
}

/** One-line descriptions printed by the CLI help. */
export const CONFIG_KEY_DESCRIPTIONS: Readonly<Record<ConfigKey, string>> = {
  reference: "BED file of DNaseI hypersensitive sites for a single sample",
  db: "File listing the reference signal files the correlation is computed against",
  anchor: "BED file of anchor regions",
  outDirectory: "Directory that receives all results",
  matrix: "Precomputed signal matrix for a single sample",
  references: "Tab-delimited list of <reference>\\t<sample name>, one sample per line",
  matrices: "Space-delimited list of <matrix> <sample name>, one sample per line",
  tracks: "y to merge per-sample browser tracks once every sample has finished (default n)",
  assembly: "Genome assembly identifier (default hg19)",
  window: "Distance in bp around each anchor searched for candidate sites",
  correlationThreshold: "Minimum correlation reported",
  pValueThreshold: "Maximum p-value reported",
  qValueThreshold: "Maximum q-value reported",
  correlationMethod: "pearson, spearman or kendall",
  figures: "y to draw interaction landscape figures",
  figureWidth: "Width of the figure window in bp",
  zoom: "Width in bp of the zoomed figure window",
  colours: "Colours used for figure tracks",
};

export const CorrelationMethod = z.enum(["pearson", "spearman", "kendall"]);
export type CorrelationMethod = z.infer<typeof CorrelationMethod>;

export const YesNo = z.enum(["y", "n"]);
export type YesNo = z.infer<typeof YesNo>;
