import {
  createDryRunRunner,
  createProcessRunner,
  type CommandRunner,
} from "../exec/command-runner.js";
import type { Logger } from "../log/logger.js";
import { signReleaseTargets } from "../sign/keyless-signer.js";
import type { SignatureRecord } from "../sign/types.js";

export interface SignOptions {
  readonly digest: string;
  readonly targets: readonly string[];
  readonly cosign?: string;
  readonly dryRun?: boolean;
}

export async function runSignCommand(
  options: SignOptions,
  logger: Logger,
  runner?: CommandRunner,
): Promise<SignatureRecord[]> {
  const activeRunner = options.dryRun
    ? createDryRunRunner((line) => logger.info(line))
    : (runner ?? createProcessRunner());
  return await signReleaseTargets(options.targets, options.digest, {
    runner: activeRunner,
    logger,
    tools: { cosign: options.cosign ?? "cosign" },
  });
}
