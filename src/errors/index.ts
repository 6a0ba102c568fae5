export {
  BuildFailureError,
  ConfigError,
  DigestExtractionError,
  ReleaseError,
  SignTargetInconsistencyError,
  SigningFailureError,
  TriggerContextError,
  describeError,
} from "./release-errors.js";
export { ReleaseErrorCode } from "./types.js";
export type { Result } from "./types.js";
