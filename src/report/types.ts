import type { PipelineStatus } from "../pipeline/types.js";

export interface ToolInfo {
  readonly name: "release-publisher";
  readonly version: string;
}

export interface TriggerInfo {
  readonly event: string;
  readonly ref_kind: string;
  readonly ref_name: string;
  readonly commit: string;
  readonly actor: string;
  readonly repository: string;
  readonly pr_number?: number;
  readonly pr_branch?: string;
}

export interface ImageInfo {
  readonly tags: readonly string[];
  readonly labels: Readonly<Record<string, string>>;
  readonly sign_targets: readonly string[];
}

export interface BuildInfo {
  readonly skipped: boolean;
  readonly pushed: boolean;
  readonly digest?: string;
}

export interface SignatureInfo {
  readonly reference: string;
  readonly ok: boolean;
  readonly error?: string;
}

export interface ReleaseReport {
  readonly tool: ToolInfo;
  readonly status: PipelineStatus;
  readonly dry_run: boolean;
  readonly trigger: TriggerInfo;
  readonly image: ImageInfo;
  readonly build: BuildInfo;
  readonly signatures: readonly SignatureInfo[];
}
