/**
 * Central type exports
 */

// Configuration
export type {
  CalibrationConfig,
  PartialCalibrationConfig,
  InputConfig,
  OutputConfig,
  OutputFormat,
  SamplingConfig,
  ImageConfig,
  LoggingConfig,
  LogLevel,
} from "./config";
export {
  CalibrationConfigSchema,
  PartialCalibrationConfigSchema,
  OutputFormatSchema,
} from "./config";

// Context
export type {
  BuildContext,
  Issue,
  IssueType,
  DecodeIssue,
  EncodeIssue,
  CleanupIssue,
  EncodeIssueReason,
  CleanupIssueReason,
  BuildStats,
} from "./context";

// Pipeline
export type {
  NormalizedImage,
  DecodeFailure,
  EncodeFailureReason,
  NormalizeResult,
  OutputRecord,
  ItemOutcome,
  WriteSummary,
  ManifestResult,
} from "./pipeline";

// Errors
export type { CalibrationErrorKind } from "./errors";
export {
  CalibrationError,
  ValidationError,
  NotFoundError,
  NotADirectoryError,
  EmptyResultError,
  EmptyCorpusError,
  EmptyOutputError,
  EmptyManifestError,
  IOError,
  InterruptedError,
} from "./errors";

// Tracker
export type { Tracker } from "../utils/tracker";
