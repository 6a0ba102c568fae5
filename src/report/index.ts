export {
  buildImageInfo,
  buildJsonReport,
  buildTriggerInfo,
} from "./json-reporter.js";
export { readToolVersion } from "./tool-version.js";
export {
  renderImageSections,
  renderMarkdownReport,
} from "./markdown-reporter.js";
export type {
  BuildInfo,
  ImageInfo,
  ReleaseReport,
  SignatureInfo,
  ToolInfo,
  TriggerInfo,
} from "./types.js";
