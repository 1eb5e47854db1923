/**
 * Converter Scan Reader
 * Vendor files cannot be read directly, so the converter writes a small
 * metadata mzML (one peak per spectrum) that is then read with MzmlScanReader
 */

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { MzmlScanReader } from "./mzml-scan-reader";
import type { ConversionContext } from "../types";

const METADATA_FILE_NAME = "scan-metadata.mzML";

/**
 * Converter arguments for the metadata pass
 */
export function buildMetadataArgs(inputPath: string, outputPath: string): string[] {
  return [
    "--mzML",
    "--noindex",
    "--filter",
    "threshold count 1 most-intense",
    "--outfile",
    outputPath,
    inputPath,
  ];
}

export async function openConverterScanReader(
  inputPath: string,
  ctx: ConversionContext,
): Promise<MzmlScanReader> {
  const { config, logger, converterPath } = ctx;
  if (!converterPath) {
    throw new Error("Converter must be located before reading scan metadata");
  }

  const workDir = await mkdtemp(path.join(tmpdir(), "faims-split-"));
  const metadataPath = path.join(workDir, METADATA_FILE_NAME);

  try {
    logger.debug(`Extracting scan filters from ${path.basename(inputPath)}`);

    const { success } = await ctx.runProcess({
      name: path.basename(converterPath),
      program: converterPath,
      args: buildMetadataArgs(path.resolve(inputPath), metadataPath),
      workDir,
      timeoutMinutes: config.converter.timeoutMinutes,
      pollIntervalMs: config.converter.pollIntervalSeconds * 1000,
      echoOutput: ctx.verbose === true && config.converter.echoOutput,
    });

    if (!success) {
      throw new Error(`Unable to extract scan filters from ${inputPath}`);
    }

    const reader = await MzmlScanReader.open(metadataPath, inputPath);
    logger.debug(
      `Read filter text for ${reader.scanCount} scans (${reader.scanRangeStart}-${reader.scanRangeEnd})`,
    );
    return reader;
  } finally {
    await rm(workDir, { recursive: true, force: true });
  }
}
