import type { LabelSpec } from "../metadata/types.js";

export interface BuildRequest {
  readonly tags: readonly string[];
  readonly labels: LabelSpec;
  /** True for every event except pull requests. */
  readonly push: boolean;
  readonly context: string;
  readonly dockerfile: string;
  readonly cacheFrom: string;
  readonly cacheTo: string;
  readonly metadataFile: string;
}

export type BuildOutcome =
  | { readonly status: "skipped"; readonly pushed: false }
  | {
      readonly status: "built";
      readonly pushed: boolean;
      readonly metadataFile: string;
    };

export interface BuildResult {
  readonly skipped: boolean;
  readonly pushed: boolean;
  /** `sha256:<64 hex>`; absent unless pushed. */
  readonly digest?: string;
  readonly metadataFile?: string;
}

export interface BuilderTools {
  /** Container CLI, `docker` unless configured otherwise. */
  readonly docker: string;
  /** Create and bootstrap a buildx builder before building. */
  readonly setupBuilder?: boolean;
}

export interface RegistryCredentials {
  readonly registry: string;
  readonly username: string;
  readonly token: string;
}
