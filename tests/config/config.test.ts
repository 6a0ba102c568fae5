import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  DEFAULT_CONFIG,
  loadConfig,
  mergeConfig,
  resolveConfigPath,
  validateConfig,
} from "../../src/config/index.js";
import { ConfigError } from "../../src/errors/index.js";

let tempDir: string;

beforeEach(async () => {
  tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "release-config-"));
});

afterEach(async () => {
  if (tempDir) {
    await fs.rm(tempDir, { recursive: true, force: true });
  }
});

describe("validateConfig", () => {
  it("maps snake_case keys", () => {
    expect(
      validateConfig({
        registry: "registry.example.com",
        metadata_file: "out/meta.json",
        cache_to: "type=local,dest=/tmp/cache",
        setup_builder: true,
      }),
    ).toEqual({
      registry: "registry.example.com",
      metadataFile: "out/meta.json",
      cacheTo: "type=local,dest=/tmp/cache",
      setupBuilder: true,
    });
  });

  it("treats an empty document as no overrides", () => {
    expect(validateConfig(null)).toEqual({});
  });

  it("collects every error", () => {
    expect(() =>
      validateConfig({ registry: "", setup_builder: "yes", platforms: "linux" }),
    ).toThrow(
      "Invalid config: registry must be a non-empty string; setup_builder must be a boolean; unknown key 'platforms'",
    );
  });

  it("rejects a document that is not a mapping", () => {
    expect(() => validateConfig(["registry"])).toThrow(ConfigError);
  });
});

describe("loadConfig", () => {
  it("returns defaults without a config file", async () => {
    await expect(loadConfig({ cwd: tempDir })).resolves.toEqual(DEFAULT_CONFIG);
  });

  it("layers file values under overrides", async () => {
    await fs.writeFile(
      path.join(tempDir, ".release-publisher.yml"),
      ["registry: registry.example.com", "image: acme/widget-server", "context: app"].join(
        "\n",
      ),
      "utf8",
    );

    const config = await loadConfig({
      cwd: tempDir,
      overrides: { context: "services/api", dockerfile: undefined },
    });

    expect(config.registry).toBe("registry.example.com");
    expect(config.image).toBe("acme/widget-server");
    expect(config.context).toBe("services/api");
    expect(config.dockerfile).toBe("./Dockerfile");
  });

  it("fails on a missing explicit path", async () => {
    await expect(
      resolveConfigPath("missing.yml", tempDir),
    ).rejects.toThrow(`Config file not found: ${path.join(tempDir, "missing.yml")}`);
  });

  it("wraps YAML syntax errors", async () => {
    const configPath = path.join(tempDir, "broken.yml");
    await fs.writeFile(configPath, "registry: [unterminated", "utf8");

    await expect(
      loadConfig({ cwd: tempDir, configPath: "broken.yml" }),
    ).rejects.toThrow(`Unable to parse ${configPath}`);
  });
});

describe("mergeConfig", () => {
  it("skips undefined values", () => {
    expect(
      mergeConfig(DEFAULT_CONFIG, { cosign: "/opt/bin/cosign" }, { cosign: undefined })
        .cosign,
    ).toBe("/opt/bin/cosign");
  });
});
