export { runReleasePipeline } from "./release-pipeline.js";
export type {
  PipelineDeps,
  PipelineInput,
  PipelineReport,
  PipelineStatus,
} from "./types.js";
