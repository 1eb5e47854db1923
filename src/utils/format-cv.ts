/**
 * CV value formatting for file names and progress messages
 */

import path from "node:path";

/**
 * Output file for one CV: "<baseName>_<cv rounded to an integer><extension>"
 * e.g. ("Sample", -45, ".mzML") -> "Sample_-45.mzML"
 */
export function cvOutputFileName(
  baseName: string,
  cv: number,
  extension: string,
): string {
  return `${baseName}_${cv.toFixed(0)}${extension}`;
}

/**
 * Intermediate file written by the renumberer, beside the converter output
 * e.g. "/data/Sample_-45.mzML" -> "/data/Sample_-45_renumbered.mzML"
 */
export function renumberedFilePath(outputPath: string): string {
  const extension = path.extname(outputPath);
  const stem = outputPath.slice(0, outputPath.length - extension.length);
  return `${stem}_renumbered${extension}`;
}

export function formatCv(cv: number): string {
  return cv.toFixed(2);
}
