import { ConfigError } from "../errors/index.js";
import type { ConfigOverrides, ReleaseConfig } from "./types.js";

type StringKey = {
  [K in keyof ReleaseConfig]-?: ReleaseConfig[K] extends string | undefined
    ? K
    : never;
}[keyof ReleaseConfig];

type MutableOverrides = { -readonly [K in keyof ConfigOverrides]: ConfigOverrides[K] };

const STRING_KEYS = new Map<string, StringKey>([
  ["registry", "registry"],
  ["image", "image"],
  ["context", "context"],
  ["dockerfile", "dockerfile"],
  ["metadata_file", "metadataFile"],
  ["digest_field", "digestField"],
  ["cache_from", "cacheFrom"],
  ["cache_to", "cacheTo"],
  ["docker", "docker"],
  ["cosign", "cosign"],
]);


/**
 * Validate a parsed config document. Unknown keys and wrong types are all
 * reported together.
 */
export function validateConfig(input: unknown): ConfigOverrides {
  if (input === undefined || input === null) {
    return {};
  }
  if (!isRecord(input)) {
    throw new ConfigError("Invalid config: config must be a mapping");
  }

  const errors: string[] = [];
  const config: MutableOverrides = {};

  for (const [key, value] of Object.entries(input)) {
    const stringKey = STRING_KEYS.get(key);
    if (stringKey) {
      if (typeof value !== "string" || value.trim() === "") {
        errors.push(`${key} must be a non-empty string`);
        continue;
      }
      config[stringKey] = value.trim();
      continue;
    }

    if (key === "setup_builder") {
      if (typeof value !== "boolean") {
        errors.push(`${key} must be a boolean`);
        continue;
      }
      config.setupBuilder = value;
      continue;
    }

    errors.push(`unknown key '${key}'`);
  }

  if (errors.length > 0) {
    throw new ConfigError(`Invalid config: ${errors.join("; ")}`);
  }
  return config;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
