export interface ReleaseConfig {
  readonly registry: string;
  /** Image path under the registry; the repository path when unset. */
  readonly image?: string;
  readonly context: string;
  readonly dockerfile: string;
  readonly metadataFile: string;
  readonly digestField: string;
  readonly cacheFrom: string;
  readonly cacheTo: string;
  readonly setupBuilder: boolean;
  readonly docker: string;
  readonly cosign: string;
}

export type ConfigOverrides = {
  readonly [K in keyof ReleaseConfig]?: ReleaseConfig[K] | undefined;
};
