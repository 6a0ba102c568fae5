import * as github from "@actions/github";
import type { TriggerInput } from "./types.js";

/**
 * The subset of the `@actions/github` context the trigger reads.
 */
export interface ActionsContextLike {
  readonly eventName: string;
  readonly sha: string;
  readonly ref: string;
  readonly actor: string;
  readonly serverUrl: string;
  readonly repo: { readonly owner: string; readonly repo: string };
  readonly payload: {
    readonly number?: unknown;
    readonly pull_request?: { readonly number: number; readonly [key: string]: unknown };
  };
}

export function triggerInputFromActions(
  context: ActionsContextLike = github.context,
  env: NodeJS.ProcessEnv = process.env,
): TriggerInput {
  const pullRequest = context.payload.pull_request;
  const payloadNumber =
    typeof context.payload.number === "number"
      ? context.payload.number
      : pullRequest?.number;

  return {
    eventName: context.eventName,
    ref: context.ref,
    refKind: env.GITHUB_REF_TYPE,
    refName: env.GITHUB_REF_NAME,
    commitSha: context.sha,
    actor: context.actor,
    repository: `${context.repo.owner}/${context.repo.repo}`,
    serverUrl: context.serverUrl,
    prNumber: payloadNumber,
    prBranch: env.GITHUB_HEAD_REF || headRef(pullRequest?.head),
  };
}

function headRef(head: unknown): string | undefined {
  if (typeof head !== "object" || head === null || !("ref" in head)) {
    return undefined;
  }
  return typeof head.ref === "string" ? head.ref : undefined;
}
