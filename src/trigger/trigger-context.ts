import { TriggerContextError } from "../errors/index.js";
import type { EventKind, RefKind, TriggerContext, TriggerInput } from "./types.js";

export const DEFAULT_SERVER_URL = "https://github.com";

const EVENT_KINDS = new Map<string, EventKind>([
  ["push", "push"],
  ["pull_request", "pull_request"],
  ["workflow_dispatch", "manual"],
  ["manual", "manual"],
]);

const REF_PREFIXES: ReadonlyArray<readonly [string, RefKind]> = [
  ["refs/tags/", "tag"],
  ["refs/heads/", "branch"],
  ["refs/", "branch"],
];

export function eventKindFromName(eventName: string): EventKind {
  return EVENT_KINDS.get(eventName) ?? "unrecognized";
}

export function parseGitRef(
  ref: string,
): { refKind: RefKind; refName: string } {
  for (const [prefix, refKind] of REF_PREFIXES) {
    if (ref.startsWith(prefix)) {
      return { refKind, refName: ref.slice(prefix.length) };
    }
  }
  return { refKind: "branch", refName: ref };
}

/**
 * Validate raw trigger fields and freeze them into a TriggerContext.
 */
export function createTriggerContext(input: TriggerInput): TriggerContext {
  const errors: string[] = [];

  const eventName = input.eventName?.trim() ?? "";
  if (!eventName) {
    errors.push("event name is required");
  }
  const eventKind = eventKindFromName(eventName);

  const commitSha = input.commitSha?.trim() ?? "";
  if (!commitSha) {
    errors.push("commit sha is required");
  } else if (/\s/.test(commitSha)) {
    errors.push("commit sha must not contain whitespace");
  }

  const repository = input.repository?.trim() ?? "";
  if (!/^[^/\s]+\/[^/\s]+$/.test(repository)) {
    errors.push("repository must be in owner/name form");
  }

  const { refKind, refName } = resolveRef(input, errors);
  if (!refName && (eventKind === "push" || eventKind === "manual")) {
    errors.push("ref name is required for push events");
  }

  let prNumber: number | undefined;
  let prBranch: string | undefined;
  if (eventKind === "pull_request") {
    prNumber = parsePrNumber(input.prNumber, errors);
    prBranch = input.prBranch?.trim();
    if (!prBranch) {
      errors.push("pull request branch is required for pull_request events");
    }
  }

  if (errors.length > 0) {
    throw new TriggerContextError(
      `Invalid trigger context: ${errors.join("; ")}`,
    );
  }

  const context: TriggerContext = {
    eventKind,
    eventName,
    refKind,
    refName,
    commitSha,
    actor: input.actor?.trim() ?? "",
    repository,
    serverUrl: (input.serverUrl?.trim() || DEFAULT_SERVER_URL).replace(
      /\/+$/,
      "",
    ),
    ...(prNumber !== undefined ? { prNumber } : {}),
    ...(prBranch !== undefined ? { prBranch } : {}),
  };
  return Object.freeze(context);
}

function resolveRef(
  input: TriggerInput,
  errors: string[],
): { refKind: RefKind; refName: string } {
  const parsed = input.ref ? parseGitRef(input.ref.trim()) : undefined;

  let refKind: RefKind = parsed?.refKind ?? "branch";
  if (input.refKind !== undefined && input.refKind !== "") {
    if (input.refKind === "branch" || input.refKind === "tag") {
      refKind = input.refKind;
    } else {
      errors.push(`ref kind must be 'branch' or 'tag', got '${input.refKind}'`);
    }
  }

  const refName = input.refName?.trim() || parsed?.refName || "";
  return { refKind, refName };
}

function parsePrNumber(
  value: number | string | undefined,
  errors: string[],
): number | undefined {
  const parsed = typeof value === "string" ? Number(value.trim()) : value;
  if (parsed === undefined || !Number.isInteger(parsed) || parsed <= 0) {
    errors.push("pull request number must be a positive integer");
    return undefined;
  }
  return parsed;
}
