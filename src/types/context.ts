/**
 * Conversion context - flows through the entire pipeline
 * Each module reads what it needs and writes its results back
 */

import type { ConversionConfig } from "./config";
import type { InputFileDescriptor } from "./files";
import type { ProcessRunner } from "./process";
import type { RawScanReader } from "./reader";
import type { Logger } from "../utils/logger";
import type { Tracker } from "../utils/tracker";

// Re-export types from tracker
export type {
  Issue,
  IssueType,
  FileIssue,
  ConversionIssue,
  ResourceIssue,
  FileIssueReason,
  ConversionIssueReason,
  ResourceIssueReason,
  ProcessingStats,
} from "../utils/tracker";

export type ScanReaderFactory = (
  inputPath: string,
  ctx: ConversionContext,
) => Promise<RawScanReader>;

export interface ConversionContext {
  // Input - provided at initialization
  config: ConversionConfig;
  logger: Logger;

  // Unified tracking for stats and issues
  tracker: Tracker;

  // Launches external commands; the process supervisor unless a test swaps it
  runProcess: ProcessRunner;

  // Opens scan metadata for an input file; picked by extension unless overridden
  openReader?: ScanReaderFactory;

  preview?: boolean;
  verbose?: boolean;

  converterPath?: string; // Located before processing starts
  searchRoot?: string; // Directory the scanner matched files under
  files?: InputFileDescriptor[]; // Scanner output, processed in order
}
