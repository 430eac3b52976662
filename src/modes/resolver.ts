/**
 * Input mode selection.
 *
 * Priority: a matrix list wins over a reference list, which wins over the
 * single-sample keys. Lower-priority keys may be left set; they are ignored.
 */

import { ValidationError } from "../errors/index.js";
import { deriveConfig, DEFAULT_OPTION_VALUES, type PipelineConfig } from "../config/index.js";
import type { InputMode } from "../types/index.js";

export interface ResolvedRun {
  readonly mode: InputMode;
  /** Configuration with resolver defaults applied */
  readonly config: Readonly<PipelineConfig>;
}

/**
 * Select the input mode and check the fields it needs.
 *
 * @throws ValidationError naming the missing field(s)
 */
export function resolveMode(config: Readonly<PipelineConfig>): ResolvedRun {
  if (config.anchor === "" || config.outDirectory === "") {
    throw new ValidationError("missing anchor or outDirectory", ["anchor", "outDirectory"]);
  }

  const effective =
    config.assembly === ""
      ? deriveConfig(config, { assembly: DEFAULT_OPTION_VALUES.assembly })
      : config;

  if (effective.matrices !== "") {
    return { mode: { kind: "matrixList", listPath: effective.matrices }, config: effective };
  }

  if (effective.references !== "") {
    if (effective.db === "") {
      throw new ValidationError("missing db", ["db"]);
    }
    return {
      mode: { kind: "referenceList", listPath: effective.references, db: effective.db },
      config: effective,
    };
  }

  if (effective.matrix !== "") {
    return {
      mode: { kind: "singleSample", input: { kind: "matrix", matrixPath: effective.matrix } },
      config: effective,
    };
  }

  if (effective.reference !== "" && effective.db !== "") {
    return {
      mode: {
        kind: "singleSample",
        input: { kind: "reference", referencePath: effective.reference, db: effective.db },
      },
      config: effective,
    };
  }

  throw new ValidationError("missing reference or db", ["reference", "db"]);
}
