import { ReleaseErrorCode } from "./types.js";

/**
 * Base class for every fatal condition the release pipeline can raise.
 */
export class ReleaseError extends Error {
  readonly code: ReleaseErrorCode;

  constructor(message: string, code: ReleaseErrorCode) {
    super(message);
    this.name = "ReleaseError";
    this.code = code;
  }

  /**
   * Message plus whatever diagnostic payload the subclass carries.
   */
  toDetailedString(): string {
    return `${this.name} [${this.code}]: ${this.message}`;
  }
}

export class BuildFailureError extends ReleaseError {
  readonly exitCode: number;
  readonly diagnostics: string;

  /**
   * @param step what was running, e.g. "Registry login to ghcr.io"
   */
  constructor(exitCode: number, diagnostics: string, step = "Build engine") {
    super(`${step} exited with code ${exitCode}`, ReleaseErrorCode.BuildFailed);
    this.name = "BuildFailureError";
    this.exitCode = exitCode;
    this.diagnostics = diagnostics;
  }

  override toDetailedString(): string {
    const base = super.toDetailedString();
    return this.diagnostics ? `${base}\n${this.diagnostics}` : base;
  }
}

export class DigestExtractionError extends ReleaseError {
  /** Raw metadata document, kept for diagnosis. */
  readonly document?: string;

  constructor(message: string, document?: string) {
    super(message, ReleaseErrorCode.DigestExtractionFailed);
    this.name = "DigestExtractionError";
    this.document = document;
  }

  override toDetailedString(): string {
    const base = super.toDetailedString();
    return this.document === undefined
      ? base
      : `${base}\nMetadata document:\n${this.document}`;
  }
}

export class SignTargetInconsistencyError extends ReleaseError {
  readonly digest: string;

  constructor(digest: string) {
    super(
      `Image ${digest} was pushed but no sign targets were derived`,
      ReleaseErrorCode.SignTargetInconsistency,
    );
    this.name = "SignTargetInconsistencyError";
    this.digest = digest;
  }
}

export class SigningFailureError extends ReleaseError {
  readonly succeeded: readonly string[];
  readonly failed: readonly string[];

  constructor(
    succeeded: readonly string[],
    failed: readonly string[],
    reason?: string,
  ) {
    super(
      reason ??
        `Failed to sign ${failed.length} of ${succeeded.length + failed.length} references`,
      ReleaseErrorCode.SigningFailed,
    );
    this.name = "SigningFailureError";
    this.succeeded = succeeded;
    this.failed = failed;
  }

  override toDetailedString(): string {
    const lines = [super.toDetailedString()];
    for (const reference of this.succeeded) {
      lines.push(`  signed: ${reference}`);
    }
    for (const reference of this.failed) {
      lines.push(`  failed: ${reference}`);
    }
    return lines.join("\n");
  }
}

export class ConfigError extends ReleaseError {
  constructor(message: string) {
    super(message, ReleaseErrorCode.InvalidConfig);
    this.name = "ConfigError";
  }
}

export class TriggerContextError extends ReleaseError {
  constructor(message: string) {
    super(message, ReleaseErrorCode.InvalidTrigger);
    this.name = "TriggerContextError";
  }
}

export function describeError(error: unknown): string {
  if (error instanceof ReleaseError) {
    return error.toDetailedString();
  }
  return error instanceof Error ? error.message : String(error);
}
