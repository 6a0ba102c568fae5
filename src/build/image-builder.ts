import path from "node:path";
import { BuildFailureError } from "../errors/index.js";
import type { CommandRunner } from "../exec/command-runner.js";
import type { Logger } from "../log/logger.js";
import { buildBuildxArgs } from "./buildx-args.js";
import type {
  BuildOutcome,
  BuildRequest,
  BuilderTools,
  RegistryCredentials,
} from "./types.js";

export interface ImageBuilderDeps {
  readonly runner: CommandRunner;
  readonly logger: Logger;
  readonly tools: BuilderTools;
}

/**
 * Run the build engine once for the request. An empty tag list is a no-op.
 */
export async function buildImage(
  request: BuildRequest,
  deps: ImageBuilderDeps,
): Promise<BuildOutcome> {
  const { runner, logger, tools } = deps;

  if (request.tags.length === 0) {
    logger.info("No tags were derived for this event. Skipping build.");
    return { status: "skipped", pushed: false };
  }

  logger.info(`Context: ${request.context}`);
  logger.info(`Dockerfile: ${request.dockerfile}`);
  logger.info(`Tags: ${request.tags.join(" ")}`);
  logger.info(
    `Labels: ${Object.entries(request.labels)
      .map(([key, value]) => `${key}=${value}`)
      .join(" ")}`,
  );
  logger.info(`Push: ${request.push}`);
  logger.info(`Cache from: ${request.cacheFrom}`);
  logger.info(`Cache to: ${request.cacheTo}`);
  logger.info(`Metadata file: ${request.metadataFile}`);
  logger.info("Provenance: false");

  if (tools.setupBuilder) {
    await setupBuilder(runner, logger, tools.docker);
  }

  const result = await runner.run(tools.docker, buildBuildxArgs(request), {
    onOutput: (line) => logger.info(line),
  });
  if (result.exitCode !== 0) {
    throw new BuildFailureError(
      result.exitCode,
      [result.stdout, result.stderr].filter(Boolean).join("\n").trim(),
    );
  }

  return {
    status: "built",
    pushed: request.push,
    metadataFile: path.resolve(request.metadataFile),
  };
}

async function setupBuilder(
  runner: CommandRunner,
  logger: Logger,
  docker: string,
) {
  for (const args of [
    ["buildx", "create", "--use"],
    ["buildx", "inspect", "--bootstrap"],
  ]) {
    const result = await runner.run(docker, args, {
      onOutput: (line) => logger.info(line),
    });
    if (result.exitCode !== 0) {
      throw new BuildFailureError(
        result.exitCode,
        result.stderr.trim(),
        `Builder setup (${args.slice(0, 2).join(" ")})`,
      );
    }
  }
}

/**
 * `docker login` with the token on stdin; the token never reaches argv or
 * the log.
 */
export async function loginToRegistry(
  credentials: RegistryCredentials,
  deps: Pick<ImageBuilderDeps, "runner" | "logger" | "tools">,
): Promise<void> {
  deps.logger.info(
    `Logging in to ${credentials.registry} as ${credentials.username}`,
  );
  const result = await deps.runner.run(
    deps.tools.docker,
    [
      "login",
      credentials.registry,
      "-u",
      credentials.username,
      "--password-stdin",
    ],
    { input: credentials.token, onOutput: (line) => deps.logger.info(line) },
  );
  if (result.exitCode !== 0) {
    throw new BuildFailureError(
      result.exitCode,
      result.stderr.trim(),
      `Registry login to ${credentials.registry}`,
    );
  }
}
