/**
 * Dispatch of sample units and the merge step that follows them.
 */

export {
  planUnits,
  planMultiSampleUnits,
  planSingleSampleUnit,
  analysisArgs,
} from "./invocation.js";

export {
  ProcessRunner,
  wrapWithModules,
  formatCommandLine,
  type CommandRunner,
  type CommandSpec,
  type CommandOutcome,
  type ProcessRunnerOptions,
} from "./runner.js";

export { dispatchUnits, ANALYSIS_LOG_FILE, type DispatchOptions } from "./dispatcher.js";

export {
  triggerAggregation,
  mergeArgs,
  anchorsPath,
  shouldMergeTracks,
  ANCHORS_FILE,
  MERGE_LOG_FILE,
  type AggregationOptions,
} from "./aggregation.js";
