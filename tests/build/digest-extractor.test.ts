import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  extractDigest,
  findDigest,
  isContentDigest,
  readDigestFromFile,
} from "../../src/build/digest-extractor.js";
import { DigestExtractionError } from "../../src/errors/index.js";
import { DIGEST, OTHER_DIGEST, createMemoryLogger } from "../helpers/fakes.js";

let tempDir: string;

beforeEach(async () => {
  tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "release-digest-"));
});

afterEach(async () => {
  if (tempDir) {
    await fs.rm(tempDir, { recursive: true, force: true });
  }
});

describe("findDigest", () => {
  it("prefers the containerimage.digest field", () => {
    expect(
      findDigest({
        "containerimage.descriptor": { digest: OTHER_DIGEST },
        "containerimage.digest": DIGEST,
      }),
    ).toEqual({ digest: DIGEST, source: "field" });
  });

  it("falls back to the first digest in document order", () => {
    expect(
      findDigest({
        "buildx.build.ref": "builder/builder0/xyz",
        "containerimage.descriptor": { digest: DIGEST },
        later: OTHER_DIGEST,
      }),
    ).toEqual({ digest: DIGEST, source: "scan" });

    expect(findDigest({ list: ["nope", OTHER_DIGEST], later: DIGEST })).toEqual(
      { digest: OTHER_DIGEST, source: "scan" },
    );
  });

  it("scans when the field holds a malformed value", () => {
    expect(
      findDigest({ "containerimage.digest": "sha256:xyz", nested: [DIGEST] }),
    ).toEqual({ digest: DIGEST, source: "scan" });
  });

  it("returns null when nothing matches", () => {
    expect(findDigest({ a: "sha256:short", b: [1, true, null] })).toBeNull();
  });

  it("accepts only lower-case 64 character hex", () => {
    expect(isContentDigest(DIGEST)).toBe(true);
    expect(isContentDigest(`sha256:${"A".repeat(64)}`)).toBe(false);
    expect(isContentDigest(`sha256:${"a".repeat(63)}`)).toBe(false);
    expect(isContentDigest(` ${DIGEST}`)).toBe(false);
  });
});

describe("extractDigest", () => {
  it("keeps the raw document on failure", () => {
    const raw = JSON.stringify({ "image.name": "ghcr.io/acme/widget:abc123" });
    const result = extractDigest(raw);

    expect(result.ok).toBe(false);
    if (result.ok) {
      return;
    }
    expect(result.error).toBeInstanceOf(DigestExtractionError);
    expect(result.error.document).toBe(raw);
  });

  it("rejects invalid JSON", () => {
    const result = extractDigest("{not json");

    expect(result.ok).toBe(false);
    if (result.ok) {
      return;
    }
    expect(result.error.message).toContain("Build metadata is not valid JSON");
  });
});

describe("readDigestFromFile", () => {
  it("reads the digest and warns when the fallback was used", async () => {
    const metadataFile = path.join(tempDir, "buildx-metadata.json");
    await fs.writeFile(
      metadataFile,
      JSON.stringify({ "containerimage.descriptor": { digest: DIGEST } }),
      "utf8",
    );
    const logger = createMemoryLogger();

    await expect(readDigestFromFile(metadataFile, logger)).resolves.toBe(DIGEST);
    expect(logger.warnings).toHaveLength(1);
    expect(logger.lines).toContain(`Image digest: ${DIGEST}`);
  });

  it("fails when the metadata file is missing", async () => {
    await expect(
      readDigestFromFile(
        path.join(tempDir, "missing.json"),
        createMemoryLogger(),
      ),
    ).rejects.toBeInstanceOf(DigestExtractionError);
  });

  it("fails when no digest can be found", async () => {
    const metadataFile = path.join(tempDir, "buildx-metadata.json");
    await fs.writeFile(metadataFile, "{}", "utf8");

    await expect(
      readDigestFromFile(metadataFile, createMemoryLogger()),
    ).rejects.toThrow("No sha256 digest found in build metadata");
  });
});
