/**
 * Scan metadata readers
 */

import path from "node:path";
import { MzmlScanReader } from "./mzml-scan-reader";
import { openConverterScanReader } from "./converter-scan-reader";
import type { ScanReaderFactory } from "../types";

export { MzmlScanReader } from "./mzml-scan-reader";
export { openConverterScanReader, buildMetadataArgs } from "./converter-scan-reader";

/**
 * mzML input is read directly; anything else goes through the converter
 */
export const openScanReader: ScanReaderFactory = (inputPath, ctx) => {
  if (path.extname(inputPath).toLowerCase() === ".mzml") {
    return MzmlScanReader.open(inputPath);
  }
  return openConverterScanReader(inputPath, ctx);
};
