export {
  deriveReleaseMetadata,
  formatCreated,
  imageRepository,
} from "./metadata-deriver.js";
export { sanitizeBranchName } from "./sanitize.js";
export { parseReleaseVersion } from "./version.js";
export { OciLabel } from "./types.js";
export type {
  ImageTarget,
  LabelSpec,
  ReleaseMetadata,
  ReleaseVersion,
} from "./types.js";
