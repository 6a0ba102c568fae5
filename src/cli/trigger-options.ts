import { triggerInputFromActions } from "../trigger/actions-context.js";
import { triggerInputFromGit } from "../trigger/git-context.js";
import { createTriggerContext } from "../trigger/trigger-context.js";
import type { TriggerContext, TriggerInput } from "../trigger/types.js";

export type TriggerSource = "actions" | "git" | "flags";

export interface TriggerOptions {
  readonly source?: TriggerSource;
  readonly cwd?: string;
  readonly event?: string;
  readonly refType?: string;
  readonly ref?: string;
  readonly sha?: string;
  readonly actor?: string;
  readonly repository?: string;
  readonly serverUrl?: string;
  readonly prNumber?: string;
  readonly prBranch?: string;
}

export function parseTriggerSource(value: string): TriggerSource {
  if (value === "actions" || value === "git" || value === "flags") {
    return value;
  }
  throw new Error(`Unsupported trigger source: ${value}`);
}

export function defaultTriggerSource(
  env: NodeJS.ProcessEnv = process.env,
): TriggerSource {
  return env.GITHUB_ACTIONS === "true" ? "actions" : "git";
}

/**
 * Read the trigger from its source, then let explicit flags win.
 */
export async function resolveTrigger(
  options: TriggerOptions,
): Promise<TriggerContext> {
  const source = options.source ?? defaultTriggerSource();
  const base = await loadSource(source, options.cwd ?? process.cwd());
  return createTriggerContext({ ...base, ...flagOverrides(options) });
}

async function loadSource(
  source: TriggerSource,
  cwd: string,
): Promise<TriggerInput> {
  switch (source) {
    case "actions":
      return triggerInputFromActions();
    case "git":
      return await triggerInputFromGit(cwd);
    case "flags":
      return {};
  }
}

function flagOverrides(options: TriggerOptions): TriggerInput {
  const overrides: { -readonly [K in keyof TriggerInput]: TriggerInput[K] } =
    {};
  if (options.event !== undefined) {
    overrides.eventName = options.event;
  }
  if (options.refType !== undefined) {
    overrides.refKind = options.refType;
  }
  if (options.ref !== undefined) {
    overrides.refName = options.ref;
  }
  if (options.sha !== undefined) {
    overrides.commitSha = options.sha;
  }
  if (options.actor !== undefined) {
    overrides.actor = options.actor;
  }
  if (options.repository !== undefined) {
    overrides.repository = options.repository;
  }
  if (options.serverUrl !== undefined) {
    overrides.serverUrl = options.serverUrl;
  }
  if (options.prNumber !== undefined) {
    overrides.prNumber = options.prNumber;
  }
  if (options.prBranch !== undefined) {
    overrides.prBranch = options.prBranch;
  }
  return overrides;
}
