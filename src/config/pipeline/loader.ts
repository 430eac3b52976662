/**
 * Pipeline configuration loader.
 *
 * Responsible for:
 * - Reading a line-oriented `key=value` file
 * - Interpolating variables in values (see expand.ts)
 * - Capturing `module load` directives for the launched units
 * - Freezing the result so every downstream step reads the same options
 */

import { readFileSync } from "node:fs";
import { MissingFileError, ValidationError } from "../../errors/index.js";
import { expandValue } from "./expand.js";
import { ModuleNameSchema, type PipelineConfig } from "./schema.js";
import { ConfigStore } from "./store.js";

const MODULE_LOAD = "module load";

export interface LoadPipelineConfigOptions {
  /** Variables visible to interpolation after the file's own assignments */
  env?: Readonly<Record<string, string | undefined>>;
}

/**
 * Index of the first `=` not preceded by a backslash, or -1.
 */
function findAssignment(line: string): number {
  for (let i = 0; i < line.length; i++) {
    if (line[i] === "=" && (i === 0 || line[i - 1] !== "\\")) {
      return i;
    }
  }
  return -1;
}

/**
 * Module names requested by a `module load` line.
 * Only a bare directive is accepted; anything that would need a shell to
 * interpret it is refused.
 */
export function parseModuleDirective(line: string, lineNumber: number): string[] {
  const at = line.indexOf(MODULE_LOAD);
  const where = `line ${lineNumber}`;

  if (line.slice(0, at).trim() !== "") {
    throw new ValidationError(
      `${where}: only a plain "module load <name>..." directive is supported`,
      [MODULE_LOAD]
    );
  }

  const names = line
    .slice(at + MODULE_LOAD.length)
    .split(/\s+/)
    .filter((name) => name !== "");
  if (names.length === 0) {
    throw new ValidationError(`${where}: module load names no modules`, [MODULE_LOAD]);
  }

  for (const name of names) {
    const result = ModuleNameSchema.safeParse(name);
    if (!result.success) {
      const reason = result.error.issues[0]?.message ?? "invalid module name";
      throw new ValidationError(`${where}: "${name}": ${reason}`, [MODULE_LOAD]);
    }
  }

  return names;
}

/**
 * Parse configuration text into a frozen PipelineConfig.
 *
 * @param text - File contents
 * @param sourcePath - Path the text came from; recorded on the result
 * @throws ValidationError for refused expansions or directives
 */
export function parsePipelineConfig(
  text: string,
  sourcePath: string,
  options: LoadPipelineConfigOptions = {}
): Readonly<PipelineConfig> {
  const env = options.env ?? process.env;
  const store = new ConfigStore(sourcePath);
  const lookup = (name: string): string | undefined =>
    store.getAssigned(name) ?? env[name];

  const lines = text.split("\n");
  for (let i = 0; i < lines.length; i++) {
    const line = (lines[i] ?? "").replace(/\r$/, "");

    if (line.trimStart().startsWith("#")) {
      continue;
    }

    const eq = findAssignment(line);
    if (eq > 0) {
      const key = line.slice(0, eq);
      store.set(key, expandValue(line.slice(eq + 1), lookup, key));
    } else if (line.includes(MODULE_LOAD)) {
      store.addModules(parseModuleDirective(line, i + 1));
    }
  }

  return store.freeze();
}

/**
 * Read and parse a configuration file.
 *
 * @throws MissingFileError if the file cannot be read
 * @throws ValidationError for refused expansions or directives
 */
export function loadPipelineConfig(
  path: string,
  options: LoadPipelineConfigOptions = {}
): Readonly<PipelineConfig> {
  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (err) {
    throw new MissingFileError(path, err instanceof Error ? err.message : String(err));
  }

  return parsePipelineConfig(text, path, options);
}
