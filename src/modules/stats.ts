/**
 * Stats Module
 * Renders the end-of-run summary: counts, manifest location and issues
 */

import chalk, { type ChalkInstance } from "chalk";
import type { BuildStats, Issue, IssueType, Tracker } from "../types";

const ISSUE_PREVIEW = 5;
const LABEL_WIDTH = 16;

const ISSUE_GROUPS: Array<[IssueType, string]> = [
  ["decode", "Decode failed"],
  ["encode", "Encode failed"],
  ["cleanup", "Cleanup failed"],
];

export interface StatsOptions {
  verbose?: boolean;
  manifestPath?: string;
  // Set when the run ended on a fatal error
  failure?: string;
}

/**
 * Short elapsed time: 250ms, 1.5s, 2m 05s
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;

  const whole = Math.round(ms / 1000);
  const minutes = Math.floor(whole / 60);
  const seconds = String(whole % 60).padStart(2, "0");
  return `${minutes}m ${seconds}s`;
}

/**
 * Written-of-sampled meter, e.g. `████████░░ 4/5`
 */
function meter(paint: ChalkInstance, done: number, total: number, width = 20): string {
  const filled = total === 0 ? 0 : Math.round((done / total) * width);
  return (
    paint.green("█".repeat(filled)) +
    paint.dim("░".repeat(width - filled)) +
    ` ${done}/${total}`
  );
}

function row(paint: ChalkInstance, label: string, value: string | number): string {
  return `   ${paint.dim(label.padEnd(LABEL_WIDTH))} ${value}`;
}

/**
 * Build the summary as printable lines
 */
export function renderSummary(
  summary: BuildStats,
  options: StatsOptions = {},
  paint: ChalkInstance = chalk,
): string[] {
  const lines: string[] = [];
  const failed = summary.decodeFailures + summary.encodeFailures;

  const icon = options.failure
    ? paint.red("✖")
    : failed > 0
      ? paint.yellow("◆")
      : paint.green("✔");
  const title = options.failure ? "Calibration Failed" : "Calibration Set Ready";
  lines.push(`  ${icon} ${paint.bold(title)} (${formatDuration(summary.duration)})`);
  if (options.failure) {
    lines.push(`   ${paint.red(options.failure)}`);
  }

  if (summary.sampledImages > 0) {
    const sampled = summary.usedAllImages
      ? `${summary.sampledImages} (all available)`
      : `${summary.sampledImages}`;

    lines.push("", `  ${paint.bold("Images")}`);
    lines.push(`   ${meter(paint, summary.writtenImages, summary.sampledImages)}`);
    lines.push(row(paint, "Collected", summary.collectedImages));
    lines.push(row(paint, "Sampled", sampled));
    lines.push(row(paint, "Written", paint.green(String(summary.writtenImages))));
    lines.push(row(paint, "Failed", failed > 0 ? paint.red(String(failed)) : "0"));
    if (summary.skippedImages > 0) {
      lines.push(row(paint, "Skipped", paint.yellow(String(summary.skippedImages))));
    }
    if (summary.staleRemoved > 0) {
      lines.push(row(paint, "Stale removed", summary.staleRemoved));
    }
  }

  if (options.manifestPath) {
    lines.push("", `  ${paint.bold("Manifest")}`);
    lines.push(row(paint, "Entries", summary.manifestEntries));
    lines.push(row(paint, "Path", options.manifestPath));
  }

  lines.push(...renderIssues(summary.issues, options.verbose ?? false, paint));
  return lines;
}

function describeIssue(issue: Issue): string {
  return issue.details ? `${issue.path} (${issue.details})` : issue.path;
}

function renderIssues(issues: Issue[], verbose: boolean, paint: ChalkInstance): string[] {
  if (issues.length === 0) return [];

  const lines = ["", `  ${paint.bold.red("Errors")}`];
  for (const [type, label] of ISSUE_GROUPS) {
    const group = issues.filter((issue) => issue.type === type);
    if (group.length === 0) continue;

    lines.push(row(paint, label, paint.red(String(group.length))));
    const shown = verbose ? group : group.slice(0, ISSUE_PREVIEW);
    for (const issue of shown) {
      lines.push(`     - ${describeIssue(issue)}`);
    }
    if (shown.length < group.length) {
      lines.push(paint.dim(`     +${group.length - shown.length} more (--verbose lists all)`));
    }
  }
  return lines;
}

/**
 * Print the summary to stdout
 */
export function stats(tracker: Tracker, options: StatsOptions = {}): void {
  console.log("");
  for (const line of renderSummary(tracker.getStats(), options)) {
    console.log(line);
  }
  console.log("");
}
