import type { TriggerContext } from "../trigger/types.js";
import { sanitizeBranchName } from "./sanitize.js";
import { parseReleaseVersion } from "./version.js";
import {
  OciLabel,
  type ImageTarget,
  type ReleaseMetadata,
} from "./types.js";

/**
 * Derive image tags, OCI labels and sign targets for one run. Pure: the
 * clock is passed in.
 *
 * Pull requests get a single unsigned `pr-*` tag. Pushes always get the
 * commit tag; release tags (`vX.Y.Z`) add the version plus its floating
 * minor and major tags, and `main` adds `latest`. Unrecognized events get
 * no tags at all.
 */
export function deriveReleaseMetadata(
  context: TriggerContext,
  image: ImageTarget,
  now: Date,
): ReleaseMetadata {
  const repository = imageRepository(image);
  const labels: Record<string, string> = {
    [OciLabel.Source]: `${context.serverUrl}/${context.repository}`,
    [OciLabel.Created]: formatCreated(now),
    [OciLabel.Revision]: context.commitSha,
  };
  const tags = new TagList(repository);
  const signTargets = new TagList(repository);

  switch (context.eventKind) {
    case "pull_request": {
      const branch = sanitizeBranchName(context.prBranch ?? "");
      tags.add(`pr-${context.prNumber}-${branch}-${context.commitSha}`);
      labels[OciLabel.Version] = `pr-${context.prNumber}`;
      break;
    }
    case "push":
    case "manual": {
      for (const tag of pushTags(context)) {
        tags.add(tag);
        signTargets.add(tag);
      }
      const version = versionLabel(context);
      if (version) {
        labels[OciLabel.Version] = version;
      }
      break;
    }
    case "unrecognized":
      break;
  }

  return {
    tags: tags.values(),
    labels,
    signTargets: signTargets.values(),
  };
}

function pushTags(context: TriggerContext): string[] {
  const tags = [context.commitSha];
  const release = releaseVersionOf(context);
  if (release) {
    tags.push(
      context.refName,
      `${release.major}.${release.minor}`,
      release.major,
    );
  } else if (context.refName === "main") {
    tags.push("latest");
  }
  return tags;
}

function versionLabel(context: TriggerContext): string | undefined {
  if (releaseVersionOf(context)) {
    return context.refName;
  }
  if (context.refName === "main") {
    return `latest-${context.commitSha}`;
  }
  return undefined;
}

function releaseVersionOf(context: TriggerContext) {
  return context.refKind === "tag" ? parseReleaseVersion(context.refName) : null;
}

/**
 * UTC, second precision, `Z` suffix: `2024-05-01T12:00:00Z`.
 */
export function formatCreated(now: Date): string {
  return now.toISOString().replace(/\.\d{3}Z$/, "Z");
}

export function imageRepository(image: ImageTarget): string {
  const registry = image.registry.replace(/\/+$/, "");
  const name = image.imageName.replace(/^\/+/, "").toLowerCase();
  return registry ? `${registry}/${name}` : name;
}

class TagList {
  private readonly seen = new Set<string>();

  constructor(private readonly repository: string) {}

  add(tag: string): void {
    this.seen.add(`${this.repository}:${tag}`);
  }

  values(): string[] {
    return [...this.seen];
  }
}
