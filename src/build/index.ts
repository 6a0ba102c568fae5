export { buildBuildxArgs } from "./buildx-args.js";
export { buildImage, loginToRegistry } from "./image-builder.js";
export {
  DIGEST_FIELD,
  extractDigest,
  findDigest,
  isContentDigest,
  readDigestFromFile,
} from "./digest-extractor.js";
export type {
  BuildOutcome,
  BuildRequest,
  BuildResult,
  BuilderTools,
  RegistryCredentials,
} from "./types.js";
export type { DigestSource, ExtractedDigest } from "./digest-extractor.js";
