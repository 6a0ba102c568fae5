import fs from "node:fs/promises";
import path from "node:path";
import yaml from "js-yaml";
import { ConfigError } from "../errors/index.js";
import { validateConfig } from "./config-validator.js";
import type { ConfigOverrides, ReleaseConfig } from "./types.js";

export const CONFIG_FILE_NAMES = [
  ".release-publisher.yml",
  ".release-publisher.yaml",
] as const;

export const DEFAULT_CONFIG: ReleaseConfig = {
  registry: "ghcr.io",
  context: ".",
  dockerfile: "./Dockerfile",
  metadataFile: "buildx-metadata.json",
  digestField: "containerimage.digest",
  cacheFrom: "type=gha",
  cacheTo: "type=gha,mode=max",
  setupBuilder: false,
  docker: "docker",
  cosign: "cosign",
};

/**
 * Explicit path, else the first known config file in `cwd`, else none.
 */
export async function resolveConfigPath(
  customPath: string | undefined,
  cwd: string = process.cwd(),
): Promise<string | undefined> {
  if (customPath) {
    const resolved = path.resolve(cwd, customPath);
    if (!(await existsFile(resolved))) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    return resolved;
  }

  for (const name of CONFIG_FILE_NAMES) {
    const candidate = path.join(cwd, name);
    if (await existsFile(candidate)) {
      return candidate;
    }
  }
  return undefined;
}

export async function loadConfigFile(configPath: string): Promise<ConfigOverrides> {
  const raw = await fs.readFile(configPath, "utf8");
  let parsed: unknown;
  try {
    parsed = yaml.load(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Unable to parse ${configPath}: ${reason}`);
  }
  return validateConfig(parsed);
}

/**
 * Defaults, then the config file, then command-line or action overrides.
 */
export async function loadConfig(
  options: {
    readonly configPath?: string;
    readonly cwd?: string;
    readonly overrides?: ConfigOverrides;
  } = {},
): Promise<ReleaseConfig> {
  const configPath = await resolveConfigPath(options.configPath, options.cwd);
  const fromFile = configPath ? await loadConfigFile(configPath) : {};
  return mergeConfig(DEFAULT_CONFIG, fromFile, options.overrides ?? {});
}

export function mergeConfig(
  base: ReleaseConfig,
  ...layers: readonly ConfigOverrides[]
): ReleaseConfig {
  let merged: ReleaseConfig = base;
  for (const layer of layers) {
    const defined = Object.fromEntries(
      Object.entries(layer).filter(([, value]) => value !== undefined),
    );
    merged = { ...merged, ...defined };
  }
  return merged;
}

async function existsFile(targetPath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(targetPath);
    return stats.isFile();
  } catch {
    return false;
  }
}
