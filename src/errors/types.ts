export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export const enum ReleaseErrorCode {
  BuildFailed = "BUILD_FAILED",
  DigestExtractionFailed = "DIGEST_EXTRACTION_FAILED",
  SignTargetInconsistency = "SIGN_TARGET_INCONSISTENCY",
  SigningFailed = "SIGNING_FAILED",
  InvalidConfig = "INVALID_CONFIG",
  InvalidTrigger = "INVALID_TRIGGER",
}
