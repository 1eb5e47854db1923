/**
 * Central type exports
 */

// Configuration
export type {
  ConversionConfig,
  PartialConversionConfig,
  InputConfig,
  OutputConfig,
  ConverterConfig,
  ScansConfig,
  LoggingConfig,
  LogLevel,
  ConfigError,
} from "./config";
export {
  ConversionConfigSchema,
  PartialConversionConfigSchema,
} from "./config";

// Files
export type {
  InputFileDescriptor,
  CvObservation,
  CvDiscovery,
  ConversionStep,
  ConversionOutcome,
} from "./files";

// Scan metadata
export type { RawScanReader } from "./reader";

// Processes
export type {
  ProcessState,
  FinalProcessState,
  ProcessRequest,
  ProcessResult,
  ProcessRunner,
} from "./process";

// Context
export type {
  ConversionContext,
  ScanReaderFactory,
  Issue,
  IssueType,
  FileIssue,
  ConversionIssue,
  ResourceIssue,
  FileIssueReason,
  ConversionIssueReason,
  ResourceIssueReason,
  ProcessingStats,
} from "./context";

// Tracker
export { Tracker } from "../utils/tracker";

// Command-line options
export type { ConvertOptions } from "./options";
export { ConvertOptionsSchema } from "./options";
