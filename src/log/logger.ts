import * as core from "@actions/core";

export interface Logger {
  info(message: string): void;
  warning(message: string): void;
  error(message: string): void;
  /** Runs `fn` inside a delimited, named block of output. */
  group<T>(name: string, fn: () => Promise<T>): Promise<T>;
}

export function createActionsLogger(): Logger {
  return {
    info: (message) => core.info(message),
    warning: (message) => core.warning(message),
    error: (message) => core.error(message),
    group: (name, fn) => core.group(name, fn),
  };
}

export interface StreamLoggerOptions {
  readonly quiet?: boolean;
  readonly stream?: NodeJS.WritableStream;
}

/**
 * Plain-text logger for the CLI. Group markers match the Actions syntax so
 * local and CI output read the same.
 */
export function createStreamLogger(options: StreamLoggerOptions = {}): Logger {
  const stream = options.stream ?? process.stderr;
  const quiet = options.quiet ?? false;
  const write = (line: string) => {
    stream.write(`${line}\n`);
  };

  return {
    info: (message) => {
      if (!quiet) {
        write(message);
      }
    },
    warning: (message) => write(`Warning: ${message}`),
    error: (message) => write(`Error: ${message}`),
    group: async <T>(name: string, fn: () => Promise<T>): Promise<T> => {
      write(`::group::${name}`);
      try {
        return await fn();
      } finally {
        write("::endgroup::");
      }
    },
  };
}
