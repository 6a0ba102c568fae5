#!/usr/bin/env node
import path from "node:path";
import { fileURLToPath } from "node:url";
import { Command } from "commander";
import type { ConfigOverrides } from "../config/types.js";
import { describeError } from "../errors/index.js";
import { createStreamLogger } from "../log/logger.js";
import { readToolVersion } from "../report/tool-version.js";
import { runDeriveCommand } from "./derive-command.js";
import { runDigestCommand } from "./digest-command.js";
import { runPublishCommand } from "./publish-command.js";
import { runSignCommand } from "./sign-command.js";
import {
  parseTriggerSource,
  type TriggerOptions,
} from "./trigger-options.js";

interface TriggerFlags {
  source?: string;
  event?: string;
  refType?: string;
  ref?: string;
  sha?: string;
  actor?: string;
  repository?: string;
  serverUrl?: string;
  prNumber?: string;
  prBranch?: string;
}

interface ConfigFlags {
  config?: string;
  registry?: string;
  image?: string;
  context?: string;
  file?: string;
  metadataFile?: string;
  cacheFrom?: string;
  cacheTo?: string;
  setupBuilder?: boolean;
  docker?: string;
  cosign?: string;
}

interface DeriveFlags extends TriggerFlags, ConfigFlags {
  format: string;
}

interface PublishFlags extends TriggerFlags, ConfigFlags {
  format: string;
  out?: string;
  dryRun?: boolean;
  registryTokenEnv?: string;
}

const program = new Command();
const toolVersion = await loadVersion();

program
  .name("release-publisher")
  .description("Tag, build, push and keyless-sign a container image from CI trigger metadata")
  .version(toolVersion)
  .option("--quiet", "Suppress non-essential output");

withConfigOptions(
  withTriggerOptions(
    program
      .command("derive")
      .description("Print the tags, labels and sign targets for a trigger")
      .option("--format <format>", "Output format (json|md)", "json"),
  ),
).action(async (options: DeriveFlags) => {
  try {
    const result = await runDeriveCommand({
      trigger: toTriggerOptions(options),
      configPath: options.config,
      config: toConfigOverrides(options),
      format: parseFormat(options.format),
    });
    await writeStdout(result.output + "\n");
  } catch (error) {
    await writeError(error);
    process.exitCode = 1;
  }
});

withConfigOptions(
  withTriggerOptions(
    program
      .command("publish")
      .description("Build, push and sign the image for a trigger")
      .option("--format <format>", "Report format (json|md)", "md")
      .option("--out <file>", "Write report to file")
      .option("--dry-run", "Log commands without running them")
      .option(
        "--registry-token-env <name>",
        "Log in to the registry with the token in this environment variable",
      ),
  ),
).action(async (options: PublishFlags) => {
  try {
    const result = await runPublishCommand(
      {
        trigger: toTriggerOptions(options),
        configPath: options.config,
        config: toConfigOverrides(options),
        format: parseFormat(options.format),
        out: options.out,
        dryRun: Boolean(options.dryRun),
        registryTokenEnv: options.registryTokenEnv,
      },
      toolVersion,
      { logger: createStreamLogger({ quiet: isQuiet() }) },
    );
    if (!options.out) {
      await writeStdout(result.output + "\n");
    }
  } catch (error) {
    await writeError(error);
    process.exitCode = 1;
  }
});

program
  .command("digest")
  .description("Extract the image digest from a build metadata file")
  .argument("<metadata-file>", "Build metadata JSON written by buildx")
  .option("--field <name>", "Top-level field holding the digest")
  .action(async (metadataFile: string, options: { field?: string }) => {
    try {
      const digest = await runDigestCommand(
        { metadataFile, field: options.field },
        createStreamLogger({ quiet: isQuiet() }),
      );
      await writeStdout(digest + "\n");
    } catch (error) {
      await writeError(error);
      process.exitCode = 1;
    }
  });

program
  .command("sign")
  .description("Keyless-sign image references bound to a digest")
  .argument("<targets...>", "Fully qualified image tags")
  .requiredOption("--digest <digest>", "Content digest (sha256:...)")
  .option("--cosign <path>", "Signer executable", "cosign")
  .option("--dry-run", "Log commands without running them")
  .action(
    async (
      targets: string[],
      options: { digest: string; cosign: string; dryRun?: boolean },
    ) => {
      try {
        await runSignCommand(
          {
            digest: options.digest,
            targets,
            cosign: options.cosign,
            dryRun: Boolean(options.dryRun),
          },
          createStreamLogger({ quiet: isQuiet() }),
        );
      } catch (error) {
        await writeError(error);
        process.exitCode = 1;
      }
    },
  );

function withTriggerOptions(command: Command): Command {
  return command
    .option("--source <source>", "Trigger source (actions|git|flags)")
    .option("--event <name>", "Event name (push|pull_request|workflow_dispatch)")
    .option("--ref-type <kind>", "Ref kind (branch|tag)")
    .option("--ref <name>", "Ref name, e.g. main or v1.2.3")
    .option("--sha <sha>", "Commit SHA")
    .option("--actor <name>", "User that triggered the run")
    .option("--repository <owner/name>", "Source repository path")
    .option("--server-url <url>", "Source host URL")
    .option("--pr-number <number>", "Pull request number")
    .option("--pr-branch <branch>", "Pull request head branch");
}

function withConfigOptions(command: Command): Command {
  return command
    .option("--config <path>", "Config file")
    .option("--registry <host>", "Image registry")
    .option("--image <name>", "Image path under the registry")
    .option("--context <path>", "Build context")
    .option("--file <path>", "Dockerfile")
    .option("--metadata-file <path>", "Build metadata output file")
    .option("--cache-from <spec>", "Build cache source")
    .option("--cache-to <spec>", "Build cache destination")
    .option("--setup-builder", "Create and bootstrap a buildx builder first")
    .option("--docker <path>", "Container CLI executable")
    .option("--cosign <path>", "Signer executable");
}

function toTriggerOptions(flags: TriggerFlags): TriggerOptions {
  return {
    source: flags.source ? parseTriggerSource(flags.source) : undefined,
    event: flags.event,
    refType: flags.refType,
    ref: flags.ref,
    sha: flags.sha,
    actor: flags.actor,
    repository: flags.repository,
    serverUrl: flags.serverUrl,
    prNumber: flags.prNumber,
    prBranch: flags.prBranch,
  };
}

function toConfigOverrides(flags: ConfigFlags): ConfigOverrides {
  return {
    registry: flags.registry,
    image: flags.image,
    context: flags.context,
    dockerfile: flags.file,
    metadataFile: flags.metadataFile,
    cacheFrom: flags.cacheFrom,
    cacheTo: flags.cacheTo,
    setupBuilder: flags.setupBuilder,
    docker: flags.docker,
    cosign: flags.cosign,
  };
}

function isQuiet(): boolean {
  return Boolean(program.opts<{ quiet?: boolean }>().quiet);
}

async function loadVersion(): Promise<string> {
  const dir = path.dirname(fileURLToPath(import.meta.url));
  return await readToolVersion(path.resolve(dir, "..", ".."));
}

function parseFormat(value: string): "json" | "md" {
  if (value === "json" || value === "md") {
    return value;
  }
  throw new Error(`Unsupported format: ${value}`);
}

async function writeStdout(message: string): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    process.stdout.write(message, (error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}

async function writeError(error: unknown): Promise<void> {
  await new Promise<void>((resolve) => {
    process.stderr.write(describeError(error) + "\n", () => resolve());
  });
}

await program.parseAsync(process.argv);
