/**
 * Pipeline configuration module.
 *
 * Usage:
 *   import { loadPipelineConfig } from "./config/pipeline/index.js";
 *
 *   const config = loadPipelineConfig("run.config");
 *   config.outDirectory; // frozen, defaults applied
 */

export {
  CONFIG_KEYS,
  CONFIG_KEY_DESCRIPTIONS,
  CorrelationMethod,
  YesNo,
  isConfigKey,
  type ConfigKey,
} from "./enums.js";

export type { PipelineConfig } from "./schema.js";
export { PipelineConfigSchema, ModuleNameSchema } from "./schema.js";

export { DEFAULT_OPTION_VALUES } from "./defaults.js";

export { ConfigStore, readOption, deriveConfig } from "./store.js";

export { expandValue, type VariableLookup } from "./expand.js";

export {
  loadPipelineConfig,
  parsePipelineConfig,
  parseModuleDirective,
  type LoadPipelineConfigOptions,
} from "./loader.js";

export { inspectOptions, type OptionWarning } from "./options.js";
