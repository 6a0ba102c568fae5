import { describe, expect, it } from "vitest";
import {
  deriveReleaseMetadata,
  formatCreated,
  imageRepository,
} from "../../src/metadata/metadata-deriver.js";
import { sanitizeBranchName } from "../../src/metadata/sanitize.js";
import { parseReleaseVersion } from "../../src/metadata/version.js";
import type { TriggerContext } from "../../src/trigger/types.js";

const image = { registry: "ghcr.io", imageName: "acme/widget" };
const now = new Date("2024-05-01T12:34:56.789Z");
const repo = "ghcr.io/acme/widget";

function makeContext(overrides: Partial<TriggerContext> = {}): TriggerContext {
  return {
    eventKind: "push",
    eventName: "push",
    refKind: "branch",
    refName: "main",
    commitSha: "abc123",
    actor: "octocat",
    repository: "acme/widget",
    serverUrl: "https://github.com",
    ...overrides,
  };
}

describe("deriveReleaseMetadata", () => {
  it("tags pull requests once and never signs them", () => {
    const metadata = deriveReleaseMetadata(
      makeContext({
        eventKind: "pull_request",
        eventName: "pull_request",
        refName: "42/merge",
        commitSha: "def456",
        prNumber: 42,
        prBranch: "feat/x y",
      }),
      image,
      now,
    );

    expect(metadata.tags).toEqual([`${repo}:pr-42-feat-x-y-def456`]);
    expect(metadata.signTargets).toEqual([]);
    expect(metadata.labels["org.opencontainers.image.version"]).toBe("pr-42");
  });

  it("adds version, minor and major tags for release tags", () => {
    const metadata = deriveReleaseMetadata(
      makeContext({ refKind: "tag", refName: "v1.2.3" }),
      image,
      now,
    );

    expect(metadata.tags).toEqual([
      `${repo}:abc123`,
      `${repo}:v1.2.3`,
      `${repo}:1.2`,
      `${repo}:1`,
    ]);
    expect(metadata.signTargets).toEqual(metadata.tags);
    expect(metadata.labels["org.opencontainers.image.version"]).toBe("v1.2.3");
  });

  it("builds floating tags from the version text", () => {
    const padded = deriveReleaseMetadata(
      makeContext({ refKind: "tag", refName: "v01.02.3" }),
      image,
      now,
    );
    const large = deriveReleaseMetadata(
      makeContext({ refKind: "tag", refName: "v12345678901234567890.0.0" }),
      image,
      now,
    );

    expect(padded.tags.slice(2)).toEqual([`${repo}:01.02`, `${repo}:01`]);
    expect(large.tags.slice(2)).toEqual([
      `${repo}:12345678901234567890.0`,
      `${repo}:12345678901234567890`,
    ]);
  });

  it("adds latest for pushes to main", () => {
    const metadata = deriveReleaseMetadata(makeContext(), image, now);

    expect(metadata.tags).toEqual([`${repo}:abc123`, `${repo}:latest`]);
    expect(metadata.signTargets).toEqual([`${repo}:abc123`, `${repo}:latest`]);
    expect(metadata.labels["org.opencontainers.image.version"]).toBe(
      "latest-abc123",
    );
  });

  it("keeps only the commit tag for other branches", () => {
    const metadata = deriveReleaseMetadata(
      makeContext({ refName: "feature/login" }),
      image,
      now,
    );

    expect(metadata.tags).toEqual([`${repo}:abc123`]);
    expect(metadata.signTargets).toEqual([`${repo}:abc123`]);
    expect(metadata.labels).not.toHaveProperty(
      "org.opencontainers.image.version",
    );
  });

  it("does not treat malformed or branch versions as releases", () => {
    for (const context of [
      makeContext({ refKind: "tag", refName: "v1.2" }),
      makeContext({ refKind: "tag", refName: "vX.Y.Z" }),
      makeContext({ refKind: "tag", refName: "v1.2.3-rc.1" }),
      makeContext({ refKind: "branch", refName: "v1.2.3" }),
    ]) {
      expect(deriveReleaseMetadata(context, image, now).tags).toEqual([
        `${repo}:abc123`,
      ]);
    }
  });

  it("treats manual runs like pushes", () => {
    const metadata = deriveReleaseMetadata(
      makeContext({ eventKind: "manual", eventName: "workflow_dispatch" }),
      image,
      now,
    );

    expect(metadata.tags).toEqual([`${repo}:abc123`, `${repo}:latest`]);
  });

  it("derives nothing for unrecognized events", () => {
    const metadata = deriveReleaseMetadata(
      makeContext({ eventKind: "unrecognized", eventName: "schedule" }),
      image,
      now,
    );

    expect(metadata.tags).toEqual([]);
    expect(metadata.signTargets).toEqual([]);
    expect(Object.keys(metadata.labels)).toEqual([
      "org.opencontainers.image.source",
      "org.opencontainers.image.created",
      "org.opencontainers.image.revision",
    ]);
  });

  it("always sets source, created and revision labels", () => {
    const metadata = deriveReleaseMetadata(makeContext(), image, now);

    expect(metadata.labels["org.opencontainers.image.source"]).toBe(
      "https://github.com/acme/widget",
    );
    expect(metadata.labels["org.opencontainers.image.created"]).toBe(
      "2024-05-01T12:34:56Z",
    );
    expect(metadata.labels["org.opencontainers.image.revision"]).toBe("abc123");
  });

  it("drops duplicate tags", () => {
    const metadata = deriveReleaseMetadata(
      makeContext({ commitSha: "latest" }),
      image,
      now,
    );

    expect(metadata.tags).toEqual([`${repo}:latest`]);
    expect(metadata.signTargets).toEqual([`${repo}:latest`]);
  });
});

describe("sanitizeBranchName", () => {
  it("replaces characters outside letters, digits, dot and dash", () => {
    expect(sanitizeBranchName("feat/x y")).toBe("feat-x-y");
    expect(sanitizeBranchName("fix_bug#12")).toBe("fix-bug-12");
    expect(sanitizeBranchName("release-1.2")).toBe("release-1.2");
  });

  it("is idempotent", () => {
    for (const branch of ["feat/x y", "a__b", "ünïcode/branch", "ok-1.0"]) {
      const once = sanitizeBranchName(branch);
      expect(sanitizeBranchName(once)).toBe(once);
    }
  });
});

describe("parseReleaseVersion", () => {
  it("parses numeric vX.Y.Z", () => {
    expect(parseReleaseVersion("v10.0.7")).toEqual({
      major: "10",
      minor: "0",
      patch: "7",
    });
  });

  it("keeps components as written", () => {
    expect(parseReleaseVersion("v01.02.3")).toEqual({
      major: "01",
      minor: "02",
      patch: "3",
    });
  });

  it("rejects anything else", () => {
    expect(parseReleaseVersion("1.2.3")).toBeNull();
    expect(parseReleaseVersion("v1.2.x")).toBeNull();
    expect(parseReleaseVersion("v1.2.3.4")).toBeNull();
  });
});

describe("formatting helpers", () => {
  it("formats created timestamps without milliseconds or spaces", () => {
    expect(formatCreated(new Date("2023-01-02T03:04:05.000Z"))).toBe(
      "2023-01-02T03:04:05Z",
    );
  });

  it("lower-cases the image path and trims stray slashes", () => {
    expect(
      imageRepository({ registry: "ghcr.io/", imageName: "Acme/Widget" }),
    ).toBe("ghcr.io/acme/widget");
  });
});
