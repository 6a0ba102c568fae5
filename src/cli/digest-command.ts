import type { Logger } from "../log/logger.js";
import { DIGEST_FIELD, readDigestFromFile } from "../build/digest-extractor.js";

export interface DigestOptions {
  readonly metadataFile: string;
  readonly field?: string;
}

export async function runDigestCommand(
  options: DigestOptions,
  logger: Logger,
): Promise<string> {
  return await readDigestFromFile(
    options.metadataFile,
    logger,
    options.field ?? DIGEST_FIELD,
  );
}
