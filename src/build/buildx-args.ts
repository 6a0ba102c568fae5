import type { BuildRequest } from "./types.js";

/**
 * Arguments for `docker buildx build`, context first. Every tag and label is
 * its own argument, so values containing spaces survive intact.
 */
export function buildBuildxArgs(request: BuildRequest): string[] {
  const args = ["buildx", "build", request.context, "--file", request.dockerfile];

  for (const [key, value] of Object.entries(request.labels)) {
    args.push("--label", `${key}=${value}`);
  }
  for (const tag of request.tags) {
    args.push("--tag", tag);
  }

  args.push("--cache-from", request.cacheFrom);
  args.push("--cache-to", request.cacheTo);
  args.push("--metadata-file", request.metadataFile);
  args.push("--provenance=false");

  if (request.push) {
    args.push("--push");
  }
  return args;
}
