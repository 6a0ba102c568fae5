import type { ReleaseVersion } from "./types.js";

const RELEASE_VERSION = /^v(\d+)\.(\d+)\.(\d+)$/;

export function parseReleaseVersion(refName: string): ReleaseVersion | null {
  const match = RELEASE_VERSION.exec(refName);
  if (!match) {
    return null;
  }
  const [, major, minor, patch] = match;
  return { major, minor, patch };
}
