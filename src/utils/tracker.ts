/**
 * Build Tracker
 * Unified tracking for stats and issues
 */

import type {
  DecodeFailure,
  EncodeFailureReason,
  ItemOutcome,
} from "../types/pipeline";

// ============================================================================
// Types
// ============================================================================

// Type-safe reasons for each issue type
export type EncodeIssueReason = EncodeFailureReason;
export type CleanupIssueReason = "remove-failed";

// Discriminated union - each type has its own subset of reasons
export interface DecodeIssue {
  type: "decode";
  path: string;
  reason: DecodeFailure["reason"];
  details?: string;
}

export interface EncodeIssue {
  type: "encode";
  path: string;
  reason: EncodeIssueReason;
  details?: string;
}

export interface CleanupIssue {
  type: "cleanup";
  path: string;
  reason: CleanupIssueReason;
  details?: string;
}

export type Issue = DecodeIssue | EncodeIssue | CleanupIssue;
export type IssueType = Issue["type"];

export interface BuildStats {
  // Collection and sampling
  collectedImages: number;
  sampledImages: number;
  usedAllImages: boolean;

  // Per-item results
  writtenImages: number;
  decodeFailures: number;
  encodeFailures: number;
  skippedImages: number;

  // Output directory housekeeping
  staleRemoved: number;
  manifestEntries: number;

  // All issues
  issues: Issue[];

  // Timing
  duration: number;
}

// ============================================================================
// Error Mapping
// ============================================================================

/**
 * Classify an encode/write error: filesystem refusals vs. codec rejections
 */
export function mapEncodeError(error: unknown): {
  reason: EncodeIssueReason;
  details: string;
} {
  const details = error instanceof Error ? error.message : String(error);

  if (error instanceof Error && "code" in error) {
    if (
      error.code === "EACCES" ||
      error.code === "EPERM" ||
      error.code === "ENOSPC" ||
      error.code === "EROFS"
    ) {
      return { reason: "write-error", details };
    }
  }

  return { reason: "encode-failed", details };
}

// ============================================================================
// Tracker Class
// ============================================================================

export class Tracker {
  private collectedImages = 0;
  private sampledImages = 0;
  private usedAllImages = false;
  private writtenImages = 0;
  private decodeFailures = 0;
  private encodeFailures = 0;
  private skippedImages = 0;
  private staleRemoved = 0;
  private manifestEntries = 0;
  private issues: Issue[] = [];
  private startTime = new Date();

  // ============================================================================
  // Stat counters
  // ============================================================================

  setCollected(count: number): void {
    this.collectedImages = count;
  }

  setSampled(count: number, usedAll: boolean): void {
    this.sampledImages = count;
    this.usedAllImages = usedAll;
  }

  incrementStaleRemoved(): void {
    this.staleRemoved++;
  }

  setManifestEntries(count: number): void {
    this.manifestEntries = count;
  }

  /**
   * Tally one per-item outcome
   * Outcomes are recorded by the single owner that collected them, in ordinal order
   */
  record(outcome: ItemOutcome): void {
    switch (outcome.status) {
      case "written":
        this.writtenImages++;
        break;
      case "decode-failed":
        this.decodeFailures++;
        this.issues.push({
          type: "decode",
          path: outcome.source,
          reason: outcome.failure.reason,
          details: outcome.failure.details,
        });
        break;
      case "encode-failed":
        this.encodeFailures++;
        this.issues.push({
          type: "encode",
          path: outcome.record.path,
          reason: outcome.reason,
          details: outcome.details,
        });
        break;
      case "skipped":
        this.skippedImages++;
        break;
    }
  }

  // ============================================================================
  // Issue tracking
  // ============================================================================

  trackCleanupError(path: string, error: unknown): void {
    const details = error instanceof Error ? error.message : String(error);
    this.issues.push({ type: "cleanup", path, reason: "remove-failed", details });
  }

  // ============================================================================
  // Issue getters
  // ============================================================================

  getIssues(type?: IssueType): Issue[] {
    if (!type) return this.issues;
    return this.issues.filter((i) => i.type === type);
  }

  // ============================================================================
  // Results
  // ============================================================================

  getStats(): BuildStats {
    const endTime = new Date();
    const duration = endTime.getTime() - this.startTime.getTime();

    return {
      collectedImages: this.collectedImages,
      sampledImages: this.sampledImages,
      usedAllImages: this.usedAllImages,
      writtenImages: this.writtenImages,
      decodeFailures: this.decodeFailures,
      encodeFailures: this.encodeFailures,
      skippedImages: this.skippedImages,
      staleRemoved: this.staleRemoved,
      manifestEntries: this.manifestEntries,
      issues: this.issues,
      duration,
    };
  }
}
