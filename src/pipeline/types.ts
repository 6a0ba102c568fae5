import type { BuildResult } from "../build/types.js";
import type { ReleaseConfig } from "../config/types.js";
import type { CommandRunner } from "../exec/command-runner.js";
import type { Logger } from "../log/logger.js";
import type { ReleaseMetadata } from "../metadata/types.js";
import type { SignatureRecord } from "../sign/types.js";
import type { TriggerContext } from "../trigger/types.js";

export type PipelineStatus = "noop" | "built" | "published";

export interface PipelineInput {
  readonly trigger: TriggerContext;
  readonly config: ReleaseConfig;
  readonly now?: Date;
  /** Registry password or token; login is skipped when absent. */
  readonly registryToken?: string;
  /** Log commands instead of running them. */
  readonly dryRun?: boolean;
}

export interface PipelineDeps {
  readonly runner: CommandRunner;
  readonly logger: Logger;
  readonly env?: NodeJS.ProcessEnv;
}

export interface PipelineReport {
  readonly status: PipelineStatus;
  readonly trigger: TriggerContext;
  readonly metadata: ReleaseMetadata;
  readonly build: BuildResult;
  readonly signatures: readonly SignatureRecord[];
  readonly dryRun: boolean;
}
