import {
  DigestExtractionError,
  SignTargetInconsistencyError,
  SigningFailureError,
} from "../errors/index.js";
import { isContentDigest } from "../build/digest-extractor.js";
import type { CommandRunner } from "../exec/command-runner.js";
import type { Logger } from "../log/logger.js";
import type { SignatureRecord, SignerTools } from "./types.js";

const KEYLESS_ENV = { COSIGN_EXPERIMENTAL: "true" } as const;

export interface SignerDeps {
  readonly runner: CommandRunner;
  readonly logger: Logger;
  readonly tools: SignerTools;
  readonly env?: NodeJS.ProcessEnv;
}

/**
 * Bind a mutable tag to an immutable digest.
 */
export function signatureReference(tag: string, digest: string): string {
  return `${tag}@${digest}`;
}

/**
 * Keyless-sign every target at `tag@digest`. All targets are attempted;
 * the call fails afterwards if any of them did.
 */
export async function signReleaseTargets(
  targets: readonly string[],
  digest: string,
  deps: SignerDeps,
): Promise<SignatureRecord[]> {
  const { runner, logger, tools } = deps;

  if (!isContentDigest(digest)) {
    throw new DigestExtractionError(`Refusing to sign with digest '${digest}'`);
  }
  if (targets.length === 0) {
    throw new SignTargetInconsistencyError(digest);
  }

  const references = targets.map((tag) => signatureReference(tag, digest));
  await ensureSignerAvailable(references, deps);
  warnOnMissingIdentity(deps.env ?? process.env, logger);

  logger.info(`Image digest to sign: ${digest}`);
  logger.info("The following references will be signed:");
  for (const reference of references) {
    logger.info(`  - ${reference}`);
  }

  const records: SignatureRecord[] = [];
  for (const reference of references) {
    const record = await signReference(reference, runner, logger, tools);
    if (record.ok) {
      logger.info(`Signed ${reference}`);
    } else {
      logger.error(`Failed to sign ${reference}: ${record.error}`);
    }
    records.push(record);
  }

  const failed = records.filter((record) => !record.ok);
  if (failed.length > 0) {
    throw new SigningFailureError(
      records.filter((record) => record.ok).map((record) => record.reference),
      failed.map((record) => record.reference),
    );
  }
  logger.info(`Signed all ${records.length} references.`);
  return records;
}

async function signReference(
  reference: string,
  runner: CommandRunner,
  logger: Logger,
  tools: SignerTools,
): Promise<SignatureRecord> {
  try {
    const result = await runner.run(
      tools.cosign,
      ["sign", "--yes", reference],
      { env: KEYLESS_ENV, onOutput: (line) => logger.info(line) },
    );
    if (result.exitCode === 0) {
      return { reference, ok: true };
    }
    return {
      reference,
      ok: false,
      error: result.stderr.trim() || `exit code ${result.exitCode}`,
    };
  } catch (error) {
    return {
      reference,
      ok: false,
      error: error instanceof Error ? error.message : String(error),
    };
  }
}

async function ensureSignerAvailable(
  references: readonly string[],
  deps: SignerDeps,
): Promise<void> {
  let reason: string | undefined;
  try {
    const result = await deps.runner.run(deps.tools.cosign, ["version"]);
    if (result.exitCode !== 0) {
      reason = result.stderr.trim() || `exit code ${result.exitCode}`;
    }
  } catch (error) {
    reason = error instanceof Error ? error.message : String(error);
  }
  if (reason !== undefined) {
    throw new SigningFailureError(
      [],
      references,
      `${deps.tools.cosign} is not available: ${reason}`,
    );
  }
}

export function warnOnMissingIdentity(
  env: NodeJS.ProcessEnv,
  logger: Logger,
): void {
  if (env.GITHUB_ACTIONS === "true" && !env.ACTIONS_ID_TOKEN_REQUEST_TOKEN) {
    logger.warning(
      "OIDC token not available; keyless signing needs the 'id-token: write' permission.",
    );
  }
}
