import path from "node:path";
import { fileURLToPath } from "node:url";
import * as core from "@actions/core";
import { loadConfig } from "../src/config/config-loader.js";
import type { ConfigOverrides } from "../src/config/types.js";
import { describeError } from "../src/errors/index.js";
import { createProcessRunner } from "../src/exec/command-runner.js";
import { createActionsLogger } from "../src/log/logger.js";
import { runReleasePipeline } from "../src/pipeline/release-pipeline.js";
import type { PipelineReport } from "../src/pipeline/types.js";
import { buildJsonReport } from "../src/report/json-reporter.js";
import { readToolVersion } from "../src/report/tool-version.js";
import { renderMarkdownReport } from "../src/report/markdown-reporter.js";
import { triggerInputFromActions } from "../src/trigger/actions-context.js";
import { createTriggerContext } from "../src/trigger/trigger-context.js";

async function run(): Promise<void> {
  try {
    const toolVersion = await loadVersion();
    const trigger = createTriggerContext(triggerInputFromActions());
    const config = await loadConfig({
      configPath: core.getInput("config") || undefined,
      overrides: readConfigInputs(),
    });
    const registryToken =
      core.getInput("registry-token") || process.env.GITHUB_TOKEN || undefined;
    if (registryToken) {
      core.setSecret(registryToken);
    }

    const report = await runReleasePipeline(
      {
        trigger,
        config,
        registryToken,
        dryRun: core.getBooleanInput("dry-run"),
      },
      { runner: createProcessRunner(), logger: createActionsLogger() },
    );

    setOutputs(report);
    await core.summary
      .addRaw(renderMarkdownReport(buildJsonReport(report, toolVersion)), true)
      .write();
  } catch (error) {
    core.setFailed(describeError(error));
  }
}

function readConfigInputs(): ConfigOverrides {
  const setupBuilder = core.getInput("setup-builder");
  return {
    registry: core.getInput("registry") || undefined,
    image: core.getInput("image") || undefined,
    context: core.getInput("context") || undefined,
    dockerfile: core.getInput("dockerfile") || undefined,
    metadataFile: core.getInput("metadata-file") || undefined,
    cacheFrom: core.getInput("cache-from") || undefined,
    cacheTo: core.getInput("cache-to") || undefined,
    setupBuilder: setupBuilder ? core.getBooleanInput("setup-builder") : undefined,
  };
}

function setOutputs(report: PipelineReport): void {
  core.setOutput("status", report.status);
  core.setOutput("tags", report.metadata.tags.join(" "));
  core.setOutput(
    "labels",
    Object.entries(report.metadata.labels)
      .map(([key, value]) => `${key}=${value}`)
      .join("\n"),
  );
  core.setOutput("sign-targets", report.metadata.signTargets.join(" "));
  core.setOutput("pushed", String(report.build.pushed));
  core.setOutput("digest", report.build.digest ?? "");
}

async function loadVersion(): Promise<string> {
  const dir = path.dirname(fileURLToPath(import.meta.url));
  return await readToolVersion(path.resolve(dir, "..", ".."));
}

void run();
