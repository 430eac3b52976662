export {
  planPipeline,
  describePlan,
  executePlan,
  hasFailures,
  type PipelinePlan,
  type PipelineOutcome,
  type ExecuteOptions,
} from "./run.js";
