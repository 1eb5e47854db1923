/**
 * Utility exports
 */

// Formatting utilities
export {
  cvOutputFileName,
  renumberedFilePath,
  formatCv,
} from "./format-cv";
export { formatCommandLine } from "./format-command-line";

// Filesystem utilities
export { fileExists } from "./file-exists";
export {
  findConverter,
  converterExecutableName,
  typicalConverterLocations,
} from "./find-converter";

// Config utilities
export {
  loadConfig,
  getUserConfigPath,
  loadDefaultConfig,
  mergeConfig,
} from "./load-config";
export { applyOptions } from "./apply-options";
export { createLogger, defaultLogFilePath } from "./create-logger";

// Classes
export { Logger } from "./logger";
export { Tracker, describeProcessState } from "./tracker";
export { ScanWarningLedger } from "./warning-ledger";
export {
  ProcessSupervisor,
  createProcessRunner,
  DEFAULT_POLL_INTERVAL_MS,
} from "./process-supervisor";
