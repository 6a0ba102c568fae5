export const enum OciLabel {
  Source = "org.opencontainers.image.source",
  Created = "org.opencontainers.image.created",
  Revision = "org.opencontainers.image.revision",
  Version = "org.opencontainers.image.version",
}

export interface ImageTarget {
  readonly registry: string;
  /** Repository path under the registry, usually `owner/name`. */
  readonly imageName: string;
}

export type LabelSpec = Readonly<Record<string, string>>;

export interface ReleaseMetadata {
  /** Fully qualified `registry/name:tag` references, no duplicates. */
  readonly tags: readonly string[];
  readonly labels: LabelSpec;
  /** Subset of `tags` to sign once pushed. */
  readonly signTargets: readonly string[];
}

/**
 * Version components exactly as written in the ref, so `v01.2.3` keeps its
 * leading zero and large numbers keep every digit.
 */
export interface ReleaseVersion {
  readonly major: string;
  readonly minor: string;
  readonly patch: string;
}
