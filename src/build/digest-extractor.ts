import fs from "node:fs/promises";
import { DigestExtractionError } from "../errors/index.js";
import type { Result } from "../errors/index.js";
import type { Logger } from "../log/logger.js";

export const DIGEST_FIELD = "containerimage.digest";

const CONTENT_DIGEST = /^sha256:[0-9a-f]{64}$/;

export function isContentDigest(value: unknown): value is string {
  return typeof value === "string" && CONTENT_DIGEST.test(value);
}

export type DigestSource = "field" | "scan";

export interface ExtractedDigest {
  readonly digest: string;
  readonly source: DigestSource;
}

/**
 * Find the image digest in a parsed build-metadata document: the named
 * top-level field when it holds a valid digest, otherwise the first digest
 * string found walking the document in order.
 */
export function findDigest(
  document: unknown,
  field: string = DIGEST_FIELD,
): ExtractedDigest | null {
  const candidate = isRecord(document) ? document[field] : undefined;
  if (isContentDigest(candidate)) {
    return { digest: candidate, source: "field" };
  }
  const scanned = scanForDigest(document);
  return scanned === null ? null : { digest: scanned, source: "scan" };
}

function scanForDigest(node: unknown): string | null {
  if (isContentDigest(node)) {
    return node;
  }
  const children = Array.isArray(node)
    ? node
    : isRecord(node)
      ? Object.values(node)
      : [];
  for (const child of children) {
    const found = scanForDigest(child);
    if (found !== null) {
      return found;
    }
  }
  return null;
}

export function extractDigest(
  raw: string,
  field: string = DIGEST_FIELD,
): Result<ExtractedDigest, DigestExtractionError> {
  let document: unknown;
  try {
    document = JSON.parse(raw) as unknown;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return {
      ok: false,
      error: new DigestExtractionError(
        `Build metadata is not valid JSON: ${reason}`,
        raw,
      ),
    };
  }

  const found = findDigest(document, field);
  if (!found) {
    return {
      ok: false,
      error: new DigestExtractionError(
        `No sha256 digest found in build metadata (field '${field}' or anywhere in the document)`,
        raw,
      ),
    };
  }
  return { ok: true, value: found };
}

/**
 * Read the metadata file written by the build and return its digest.
 * Throws DigestExtractionError when no digest can be found.
 */
export async function readDigestFromFile(
  metadataFile: string,
  logger: Logger,
  field: string = DIGEST_FIELD,
): Promise<string> {
  let raw: string;
  try {
    raw = await fs.readFile(metadataFile, "utf8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new DigestExtractionError(
      `Unable to read build metadata ${metadataFile}: ${reason}`,
    );
  }

  const result = extractDigest(raw, field);
  if (!result.ok) {
    throw result.error;
  }
  if (result.value.source === "scan") {
    logger.warning(
      `'${field}' not found in ${metadataFile}; using the first digest in the document.`,
    );
  }
  logger.info(`Image digest: ${result.value.digest}`);
  return result.value.digest;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
