/**
 * Values an option takes when the configuration file does not set it.
 */

import type { ConfigKey } from "./enums.js";

export const DEFAULT_OPTION_VALUES: Readonly<Record<ConfigKey, string>> = {
  reference: "",
  db: "",
  anchor: "",
  outDirectory: "",
  matrix: "",
  references: "",
  matrices: "",
  tracks: "n",
  assembly: "hg19",
  window: "",
  correlationThreshold: "",
  pValueThreshold: "",
  qValueThreshold: "",
  correlationMethod: "",
  figures: "",
  figureWidth: "",
  zoom: "",
  colours: "",
};
