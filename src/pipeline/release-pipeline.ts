import { buildImage, loginToRegistry } from "../build/image-builder.js";
import { readDigestFromFile } from "../build/digest-extractor.js";
import type { BuildRequest, BuilderTools } from "../build/types.js";
import { createDryRunRunner } from "../exec/command-runner.js";
import { deriveReleaseMetadata } from "../metadata/metadata-deriver.js";
import type { ReleaseMetadata } from "../metadata/types.js";
import { signReleaseTargets } from "../sign/keyless-signer.js";
import type { Logger } from "../log/logger.js";
import type { PipelineDeps, PipelineInput, PipelineReport } from "./types.js";

/**
 * Derive metadata, build, extract the digest, sign. Any fatal error stops
 * the remaining stages. In a dry run `deps.runner` is never called.
 */
export async function runReleasePipeline(
  input: PipelineInput,
  deps: PipelineDeps,
): Promise<PipelineReport> {
  const { trigger, config } = input;
  const { logger } = deps;
  const dryRun = input.dryRun ?? false;
  const runner = dryRun
    ? createDryRunRunner((line) => logger.info(line))
    : deps.runner;

  const metadata = await logger.group("Generate image metadata", async () => {
    const derived = deriveReleaseMetadata(
      trigger,
      { registry: config.registry, imageName: config.image ?? trigger.repository },
      input.now ?? new Date(),
    );
    logMetadata(derived, logger);
    return derived;
  });

  const base = { trigger, metadata, dryRun };

  if (metadata.tags.length === 0) {
    logger.info(
      `Event '${trigger.eventName}' produces no image tags. Nothing to build.`,
    );
    return {
      ...base,
      status: "noop",
      build: { skipped: true, pushed: false },
      signatures: [],
    };
  }

  const push = trigger.eventKind !== "pull_request";
  const tools: BuilderTools = {
    docker: config.docker,
    setupBuilder: config.setupBuilder,
  };

  if (push && input.registryToken) {
    const registryToken = input.registryToken;
    await logger.group(`Log in to ${config.registry}`, () =>
      loginToRegistry(
        {
          registry: config.registry,
          username: trigger.actor,
          token: registryToken,
        },
        { runner, logger, tools },
      ),
    );
  }

  const request: BuildRequest = {
    tags: metadata.tags,
    labels: metadata.labels,
    push,
    context: config.context,
    dockerfile: config.dockerfile,
    cacheFrom: config.cacheFrom,
    cacheTo: config.cacheTo,
    metadataFile: config.metadataFile,
  };
  const outcome = await logger.group("Build image", () =>
    buildImage(request, { runner, logger, tools }),
  );

  if (outcome.status === "skipped") {
    return {
      ...base,
      status: "noop",
      build: { skipped: true, pushed: false },
      signatures: [],
    };
  }

  if (!outcome.pushed || dryRun) {
    logger.info(
      dryRun
        ? "Dry run: nothing was pushed. Skipping digest extraction and signing."
        : "Image not pushed. No digest generated.",
    );
    return {
      ...base,
      status: "built",
      build: {
        skipped: false,
        pushed: false,
        metadataFile: outcome.metadataFile,
      },
      signatures: [],
    };
  }

  const digest = await logger.group("Extract image digest", () =>
    readDigestFromFile(outcome.metadataFile, logger, config.digestField),
  );

  const signatures = await logger.group("Sign image", () =>
    signReleaseTargets(metadata.signTargets, digest, {
      runner,
      logger,
      tools: { cosign: config.cosign },
      env: deps.env,
    }),
  );

  return {
    ...base,
    status: "published",
    build: {
      skipped: false,
      pushed: true,
      digest,
      metadataFile: outcome.metadataFile,
    },
    signatures,
  };
}

function logMetadata(metadata: ReleaseMetadata, logger: Logger): void {
  logger.info(`Tags: ${formatList(metadata.tags)}`);
  logger.info(
    `Labels: ${formatList(
      Object.entries(metadata.labels).map(([key, value]) => `${key}=${value}`),
    )}`,
  );
  logger.info(`Sign targets: ${formatList(metadata.signTargets)}`);
}

function formatList(values: readonly string[]): string {
  return values.length > 0 ? values.join(" ") : "(none)";
}
