/**
 * Utility exports
 */

// Ordering and sampling
export { comparePaths } from "./compare-paths";
export { MAX_SEED, mulberry32 } from "./random";

// Output naming
export {
  OUTPUT_PREFIX,
  ORDINAL_WIDTH,
  PARTIAL_SUFFIX,
  extensionFor,
  outputFilename,
  canonicalNamePattern,
  isStaleOutputName,
} from "./output-names";

// Filesystem utilities
export { pathExists } from "./path-exists";
export type { PathKind } from "./path-exists";
export { writeFileAtomic } from "./write-atomic";

// Config utilities
export {
  loadConfig,
  loadDefaultConfig,
  mergeConfig,
  getUserConfigPath,
} from "./load-config";
export type { ConfigError } from "./load-config";

// Classes
export { Logger } from "./logger";
export type { LogSink } from "./logger";
export { Tracker, mapEncodeError } from "./tracker";
