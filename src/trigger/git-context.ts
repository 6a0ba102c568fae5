import { simpleGit } from "simple-git";
import { parseReleaseVersion } from "../metadata/version.js";
import { DEFAULT_SERVER_URL } from "./trigger-context.js";
import type { TriggerInput } from "./types.js";

/**
 * Read trigger fields from a local checkout, for runs outside CI. A tag on
 * HEAD that looks like a release version wins over the current branch.
 */
export async function triggerInputFromGit(
  baseDir: string,
): Promise<TriggerInput> {
  const git = simpleGit({ baseDir });
  const isRepo = await git.checkIsRepo();
  if (!isRepo) {
    throw new Error(`Not a git repository: ${baseDir}`);
  }

  const commitSha = (await git.revparse(["HEAD"])).trim();
  const branch = (await git.revparse(["--abbrev-ref", "HEAD"])).trim();
  const tags = (await git.tag(["--points-at", "HEAD"]))
    .split(/\r?\n/)
    .map((tag) => tag.trim())
    .filter((tag) => tag.length > 0);
  const releaseTag = tags.find((tag) => parseReleaseVersion(tag) !== null);

  const remotes = await git.getRemotes(true);
  const origin = remotes.find((remote) => remote.name === "origin");
  const location = origin ? parseRemoteUrl(origin.refs.fetch) : null;

  return {
    eventName: "manual",
    refKind: releaseTag ? "tag" : "branch",
    refName: releaseTag ?? (branch === "HEAD" ? "" : branch),
    commitSha,
    repository: location?.repository,
    serverUrl: location?.serverUrl ?? DEFAULT_SERVER_URL,
  };
}

export function parseRemoteUrl(
  url: string,
): { serverUrl: string; repository: string } | null {
  const match =
    /^(?:https?:\/\/(?:[^@/]+@)?|ssh:\/\/(?:[^@/]+@)?|[^@/]+@)([^/:]+)(?::\d+)?[:/]([^/]+\/[^/]+?)(?:\.git)?\/?$/.exec(
      url.trim(),
    );
  if (!match?.[1] || !match[2]) {
    return null;
  }
  return { serverUrl: `https://${match[1]}`, repository: match[2] };
}
