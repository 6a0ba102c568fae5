export * from "./build/index.js";
export * from "./config/index.js";
export * from "./errors/index.js";
export * from "./metadata/index.js";
export * from "./pipeline/index.js";
export * from "./report/index.js";
export * from "./sign/index.js";
export * from "./trigger/index.js";
export {
  createDryRunRunner,
  createProcessRunner,
  formatCommand,
} from "./exec/command-runner.js";
export type {
  CommandOutput,
  CommandRunner,
  RunOptions,
} from "./exec/command-runner.js";
export { createActionsLogger, createStreamLogger } from "./log/logger.js";
export type { Logger, StreamLoggerOptions } from "./log/logger.js";
