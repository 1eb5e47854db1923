/**
 * File and per-CV type definitions
 */

export interface InputFileDescriptor {
  // Scanner fills these fields:
  inputPath: string; // Absolute path to the vendor (or mzML) file
  relativePath: string; // Relative to the search root, for display
  baseName: string; // File name without extension, used for output names
  outputDirectory: string; // Absolute directory that receives the split files

  // Processor fills these fields:
  cvCount?: number; // Distinct CV values discovered
  outputPaths?: string[]; // Output files written (or that would be, in preview)
  succeeded?: boolean;
}

/**
 * Per discovered CV value, only used while discovery runs
 */
export interface CvObservation {
  filterTextMatch: string; // e.g. "cv=-45.00"; passed verbatim to the converter
  occurrenceCount: number;
}

export interface CvDiscovery {
  // Keys are CV values in first-seen order; values are the matching filter text
  cvValues: Map<number, string>;
  scansExamined: number;
  stoppedEarly: boolean;
}

export type ConversionStep = "convert" | "renumber" | "reindex";

export interface ConversionOutcome {
  cv: number;
  outputPath: string;
  success: boolean;
  // Step that failed, when success is false
  failedStep?: ConversionStep;
}
