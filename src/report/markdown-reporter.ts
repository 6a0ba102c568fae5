import type { ImageInfo, ReleaseReport } from "./types.js";

const STATUS_TITLES = {
  noop: "Nothing to publish",
  built: "Image built (not pushed)",
  published: "Image published and signed",
} as const;

export function renderMarkdownReport(report: ReleaseReport): string {
  const lines: string[] = [];
  const suffix = report.dry_run ? " (dry run)" : "";
  lines.push(`## Release: ${STATUS_TITLES[report.status]}${suffix}`);
  lines.push("");
  lines.push(
    `**Event:** ${report.trigger.event} on ${report.trigger.ref_kind} \`${report.trigger.ref_name}\``,
  );
  lines.push(`**Commit:** \`${report.trigger.commit}\``);
  if (report.build.digest) {
    lines.push(`**Digest:** \`${report.build.digest}\``);
  }
  lines.push("");
  lines.push(renderImageSections(report.image));

  if (report.signatures.length > 0) {
    lines.push("");
    lines.push("### Signatures");
    lines.push("");
    lines.push("| Reference | Result |");
    lines.push("| --- | --- |");
    for (const signature of report.signatures) {
      lines.push(
        `| \`${signature.reference}\` | ${signature.ok ? "signed" : `failed: ${escapeCell(signature.error ?? "")}`} |`,
      );
    }
  }

  return lines.join("\n");
}

/**
 * Tags and labels only; used by `derive --format md` before anything runs.
 */
export function renderImageSections(image: ImageInfo): string {
  const lines: string[] = [];
  lines.push("### Tags");
  lines.push("");
  if (image.tags.length === 0) {
    lines.push("No tags derived for this event.");
  } else {
    const signed = new Set(image.sign_targets);
    lines.push("| Tag | Signed |");
    lines.push("| --- | --- |");
    for (const tag of image.tags) {
      lines.push(`| \`${tag}\` | ${signed.has(tag) ? "yes" : "no"} |`);
    }
  }

  lines.push("");
  lines.push("### Labels");
  lines.push("");
  lines.push("| Label | Value |");
  lines.push("| --- | --- |");
  for (const [key, value] of Object.entries(image.labels)) {
    lines.push(`| ${key} | ${escapeCell(value)} |`);
  }
  return lines.join("\n");
}

function escapeCell(value: string): string {
  return value.replace(/\|/g, "\\|").replace(/\r?\n/g, " ");
}
