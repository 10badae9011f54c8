/**
 * Pipeline module data types
 */

// ============================================================================
// Normalizer Module
// ============================================================================

/**
 * Decoded raster in interleaved channel order, exactly width × height
 */
export interface NormalizedImage {
  data: Buffer;
  width: number;
  height: number;
  channels: number;
  resized: boolean; // False when the source already had the target size
}

export type EncodeFailureReason = "encode-failed" | "write-error";

export interface DecodeFailure {
  reason: "decode-failed";
  path: string;
  details: string;
}

export type NormalizeResult =
  | { ok: true; image: NormalizedImage }
  | { ok: false; failure: DecodeFailure };

// ============================================================================
// Writer Module
// ============================================================================

/**
 * Ordinal and the canonical file it maps to
 * The ordinal is the sample's index in the sorted SampleSet
 */
export interface OutputRecord {
  ordinal: number;
  path: string;
}

/**
 * Result of processing one sample, indexed by ordinal
 */
export type ItemOutcome =
  | { status: "written"; source: string; record: OutputRecord }
  | { status: "decode-failed"; source: string; failure: DecodeFailure }
  | {
      status: "encode-failed";
      source: string;
      record: OutputRecord;
      reason: EncodeFailureReason;
      details: string;
    }
  | { status: "skipped"; source: string };

export interface WriteSummary {
  outcomes: ItemOutcome[];
  written: number;
  failed: number;
  skipped: number;
  staleRemoved: number;
}

// ============================================================================
// Manifest Module
// ============================================================================

export interface ManifestResult {
  path: string;
  entries: string[];
}
