import { loadConfig } from "../config/config-loader.js";
import type { ConfigOverrides } from "../config/types.js";
import { deriveReleaseMetadata } from "../metadata/metadata-deriver.js";
import type { ReleaseMetadata } from "../metadata/types.js";
import { buildImageInfo } from "../report/json-reporter.js";
import { renderImageSections } from "../report/markdown-reporter.js";
import { resolveTrigger, type TriggerOptions } from "./trigger-options.js";

export interface DeriveOptions {
  readonly trigger: TriggerOptions;
  readonly configPath?: string;
  readonly config?: ConfigOverrides;
  readonly format: "json" | "md";
  readonly now?: Date;
}

export interface DeriveResult {
  readonly metadata: ReleaseMetadata;
  readonly output: string;
}

export async function runDeriveCommand(
  options: DeriveOptions,
): Promise<DeriveResult> {
  const trigger = await resolveTrigger(options.trigger);
  const config = await loadConfig({
    configPath: options.configPath,
    cwd: options.trigger.cwd,
    overrides: options.config,
  });
  const metadata = deriveReleaseMetadata(
    trigger,
    { registry: config.registry, imageName: config.image ?? trigger.repository },
    options.now ?? new Date(),
  );
  const image = buildImageInfo(metadata);
  const output =
    options.format === "json"
      ? JSON.stringify(image, null, 2)
      : renderImageSections(image);
  return { metadata, output };
}
