export type EventKind = "push" | "pull_request" | "manual" | "unrecognized";

export type RefKind = "branch" | "tag";

/**
 * Snapshot of the event that started a release run. Created once, never
 * mutated.
 */
export interface TriggerContext {
  readonly eventKind: EventKind;
  /** Event name exactly as the event source reported it. */
  readonly eventName: string;
  readonly refKind: RefKind;
  readonly refName: string;
  readonly commitSha: string;
  readonly actor: string;
  /** `owner/name` path of the source repository. */
  readonly repository: string;
  readonly serverUrl: string;
  readonly prNumber?: number;
  readonly prBranch?: string;
}

/**
 * Loosely typed trigger fields as they arrive from an event source or the
 * command line, before validation.
 */
export interface TriggerInput {
  readonly eventName?: string;
  readonly refKind?: string;
  readonly refName?: string;
  /** Full git ref (`refs/heads/main`), used when kind or name is missing. */
  readonly ref?: string;
  readonly commitSha?: string;
  readonly actor?: string;
  readonly repository?: string;
  readonly serverUrl?: string;
  readonly prNumber?: number | string;
  readonly prBranch?: string;
}
