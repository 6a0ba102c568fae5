import type { ReleaseMetadata } from "../metadata/types.js";
import type { PipelineReport } from "../pipeline/types.js";
import type { TriggerContext } from "../trigger/types.js";
import type { ImageInfo, ReleaseReport, TriggerInfo } from "./types.js";

export function buildJsonReport(
  report: PipelineReport,
  toolVersion: string,
): ReleaseReport {
  return {
    tool: { name: "release-publisher", version: toolVersion },
    status: report.status,
    dry_run: report.dryRun,
    trigger: buildTriggerInfo(report.trigger),
    image: buildImageInfo(report.metadata),
    build: {
      skipped: report.build.skipped,
      pushed: report.build.pushed,
      ...(report.build.digest ? { digest: report.build.digest } : {}),
    },
    signatures: report.signatures.map((record) => ({
      reference: record.reference,
      ok: record.ok,
      ...(record.error ? { error: record.error } : {}),
    })),
  };
}

export function buildTriggerInfo(trigger: TriggerContext): TriggerInfo {
  return {
    event: trigger.eventName,
    ref_kind: trigger.refKind,
    ref_name: trigger.refName,
    commit: trigger.commitSha,
    actor: trigger.actor,
    repository: trigger.repository,
    ...(trigger.prNumber !== undefined ? { pr_number: trigger.prNumber } : {}),
    ...(trigger.prBranch !== undefined ? { pr_branch: trigger.prBranch } : {}),
  };
}

export function buildImageInfo(metadata: ReleaseMetadata): ImageInfo {
  return {
    tags: metadata.tags,
    labels: metadata.labels,
    sign_targets: metadata.signTargets,
  };
}
