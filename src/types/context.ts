/**
 * Build context - flows through the entire pipeline
 * Each module reads what it needs and writes its results back
 */

import type { CalibrationConfig } from "./config";
import type { ManifestResult, WriteSummary } from "./pipeline";
import type { Tracker } from "../utils/tracker";
import type { Logger } from "../utils/logger";

// Re-export types from tracker
export type {
  Issue,
  IssueType,
  DecodeIssue,
  EncodeIssue,
  CleanupIssue,
  EncodeIssueReason,
  CleanupIssueReason,
  BuildStats,
} from "../utils/tracker";

export interface BuildContext {
  // Input - provided at initialization
  config: CalibrationConfig;
  sourceDir: string;
  logger: Logger;

  // Unified tracking for stats and per-item issues
  tracker: Tracker;

  // Stops submission of new items when aborted
  signal?: AbortSignal;

  corpus?: string[]; // All collected images, sorted
  sampleSet?: string[]; // Sampled subset, sorted by the same order
  writeSummary?: WriteSummary;
  manifest?: ManifestResult;
}
