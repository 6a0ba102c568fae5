import { Writable } from "node:stream";
import { describe, expect, it } from "vitest";
import {
  createDryRunRunner,
  createProcessRunner,
  formatCommand,
} from "../../src/exec/command-runner.js";
import { createStreamLogger } from "../../src/log/logger.js";

describe("command runner", () => {
  it("quotes only arguments that need it", () => {
    expect(
      formatCommand("docker", [
        "buildx",
        "--label",
        "org.opencontainers.image.description=two words",
        "it's",
      ]),
    ).toBe(
      "docker buildx --label 'org.opencontainers.image.description=two words' 'it'\\''s'",
    );
  });

  it("passes input on stdin and captures output", async () => {
    const runner = createProcessRunner();

    const result = await runner.run(
      process.execPath,
      [
        "-e",
        "process.stdin.on('data', (chunk) => process.stdout.write(chunk.toString().toUpperCase()))",
      ],
      { input: "test-secret" },
    );

    expect(result).toEqual({ exitCode: 0, stdout: "TEST-SECRET", stderr: "" });
  });

  it("reports a non-zero exit instead of throwing", async () => {
    const runner = createProcessRunner();

    const result = await runner.run(process.execPath, [
      "-e",
      "process.stderr.write('boom'); process.exit(3)",
    ]);

    expect(result).toEqual({ exitCode: 3, stdout: "", stderr: "boom" });
  });

  it("forwards output lines as they are printed", async () => {
    const runner = createProcessRunner();
    const lines: string[] = [];

    const result = await runner.run(
      process.execPath,
      [
        "-e",
        "process.stdout.write('step 1\\nstep 2\\n'); process.stderr.write('pushing\\n')",
      ],
      { onOutput: (line) => lines.push(line) },
    );

    expect(result.exitCode).toBe(0);
    expect(lines).toHaveLength(3);
    expect(lines).toEqual(expect.arrayContaining(["step 1", "step 2", "pushing"]));
  });

  it("merges extra environment variables", async () => {
    const runner = createProcessRunner();

    const result = await runner.run(
      process.execPath,
      ["-e", "process.stdout.write(process.env.COSIGN_EXPERIMENTAL ?? '')"],
      { env: { COSIGN_EXPERIMENTAL: "true" } },
    );

    expect(result.stdout).toBe("true");
  });

  it("logs commands in a dry run", async () => {
    const lines: string[] = [];
    const runner = createDryRunRunner((line) => lines.push(line));

    const result = await runner.run("cosign", ["version"]);

    expect(result.exitCode).toBe(0);
    expect(lines).toEqual(["[dry run] cosign version"]);
  });
});

describe("stream logger", () => {
  function capture(quiet: boolean) {
    const chunks: string[] = [];
    const stream = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        chunks.push(chunk.toString("utf8"));
        callback();
      },
    });
    return { logger: createStreamLogger({ quiet, stream }), chunks };
  }

  it("wraps groups in markers", async () => {
    const { logger, chunks } = capture(false);

    const value = await logger.group("Build image", async () => {
      logger.info("building");
      return 42;
    });
    logger.warning("slow cache");

    expect(value).toBe(42);
    expect(chunks.join("")).toBe(
      "::group::Build image\nbuilding\n::endgroup::\nWarning: slow cache\n",
    );
  });

  it("drops info lines when quiet", () => {
    const { logger, chunks } = capture(true);

    logger.info("hidden");
    logger.error("shown");

    expect(chunks.join("")).toBe("Error: shown\n");
  });
});
