import fs from "node:fs/promises";
import { loadConfig } from "../config/config-loader.js";
import type { ConfigOverrides } from "../config/types.js";
import {
  createProcessRunner,
  type CommandRunner,
} from "../exec/command-runner.js";
import type { Logger } from "../log/logger.js";
import { runReleasePipeline } from "../pipeline/release-pipeline.js";
import { buildJsonReport } from "../report/json-reporter.js";
import { renderMarkdownReport } from "../report/markdown-reporter.js";
import type { ReleaseReport } from "../report/types.js";
import { resolveTrigger, type TriggerOptions } from "./trigger-options.js";

export interface PublishOptions {
  readonly trigger: TriggerOptions;
  readonly configPath?: string;
  readonly config?: ConfigOverrides;
  readonly format: "json" | "md";
  readonly out?: string;
  readonly dryRun?: boolean;
  /** Name of the environment variable holding the registry token. */
  readonly registryTokenEnv?: string;
  readonly now?: Date;
}

export interface PublishDeps {
  readonly logger: Logger;
  readonly runner?: CommandRunner;
  readonly env?: NodeJS.ProcessEnv;
}

export interface PublishResult {
  readonly report: ReleaseReport;
  readonly output: string;
}

export async function runPublishCommand(
  options: PublishOptions,
  toolVersion: string,
  deps: PublishDeps,
): Promise<PublishResult> {
  const env = deps.env ?? process.env;
  const trigger = await resolveTrigger(options.trigger);
  const config = await loadConfig({
    configPath: options.configPath,
    cwd: options.trigger.cwd,
    overrides: options.config,
  });

  const registryToken = resolveRegistryToken(options.registryTokenEnv, env);
  const pipelineReport = await runReleasePipeline(
    {
      trigger,
      config,
      now: options.now,
      registryToken,
      dryRun: options.dryRun,
    },
    {
      runner: deps.runner ?? createProcessRunner(),
      logger: deps.logger,
      env,
    },
  );

  const report = buildJsonReport(pipelineReport, toolVersion);
  const output =
    options.format === "json"
      ? JSON.stringify(report, null, 2)
      : renderMarkdownReport(report);

  if (options.out) {
    await fs.writeFile(options.out, output, "utf8");
  }
  return { report, output };
}

function resolveRegistryToken(
  variable: string | undefined,
  env: NodeJS.ProcessEnv,
): string | undefined {
  if (!variable) {
    return undefined;
  }
  const token = env[variable];
  if (!token) {
    throw new Error(`Environment variable ${variable} is not set`);
  }
  return token;
}
