import { execFile } from "node:child_process";
import readline from "node:readline";
import type { Readable } from "node:stream";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

export interface RunOptions {
  readonly cwd?: string;
  readonly env?: Readonly<Record<string, string>>;
  /** Written to the child's stdin, then stdin is closed. */
  readonly input?: string;
  /** Receives each stdout and stderr line as the tool prints it. */
  readonly onOutput?: (line: string) => void;
}

export interface CommandOutput {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
}

/**
 * Seam between the pipeline and the external tools it drives.
 */
export interface CommandRunner {
  run(
    command: string,
    args: readonly string[],
    options?: RunOptions,
  ): Promise<CommandOutput>;
}

export function formatCommand(command: string, args: readonly string[]): string {
  return [command, ...args].map(quoteArgument).join(" ");
}

function quoteArgument(value: string): string {
  if (/^[A-Za-z0-9_./:=@,+-]+$/.test(value)) {
    return value;
  }
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export function createProcessRunner(): CommandRunner {
  return {
    async run(command, args, options = {}) {
      const pending = execFileAsync(command, [...args], {
        cwd: options.cwd,
        env: options.env ? { ...process.env, ...options.env } : process.env,
        maxBuffer: MAX_OUTPUT_BYTES,
        encoding: "utf8",
      });
      if (options.input !== undefined) {
        pending.child.stdin?.end(options.input);
      }
      const onOutput = options.onOutput;
      if (onOutput) {
        forwardLines(pending.child.stdout, onOutput);
        forwardLines(pending.child.stderr, onOutput);
      }

      try {
        const { stdout, stderr } = await pending;
        return { exitCode: 0, stdout, stderr };
      } catch (error) {
        if (isExitError(error)) {
          return {
            exitCode: error.code,
            stdout: typeof error.stdout === "string" ? error.stdout : "",
            stderr: typeof error.stderr === "string" ? error.stderr : "",
          };
        }
        throw error;
      }
    },
  };
}

function forwardLines(
  stream: Readable | null,
  onLine: (line: string) => void,
): void {
  if (stream) {
    readline.createInterface({ input: stream }).on("line", onLine);
  }
}

interface ExitError extends Error {
  readonly code: number;
  readonly stdout?: unknown;
  readonly stderr?: unknown;
}

function isExitError(error: unknown): error is ExitError {
  return (
    error instanceof Error && "code" in error && typeof error.code === "number"
  );
}

/**
 * Logs what would run and reports success without spawning anything.
 */
export function createDryRunRunner(
  onCommand: (line: string) => void,
): CommandRunner {
  return {
    async run(command, args) {
      onCommand(`[dry run] ${formatCommand(command, args)}`);
      return { exitCode: 0, stdout: "", stderr: "" };
    },
  };
}
