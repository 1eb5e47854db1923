/**
 * Converter Module
 * Writes one output file per CV value by calling the converter with a scan filter
 */

import path from "node:path";
import { renumberScans } from "./renumberer";
import { reindex } from "./reindexer";
import { cvOutputFileName } from "../utils/format-cv";
import { formatCommandLine } from "../utils/format-command-line";
import type {
  ConversionContext,
  ConversionOutcome,
  InputFileDescriptor,
  ScansConfig,
} from "../types";

/**
 * Converter scan-number filter for the configured window, or null when unbounded
 *   start and end -> "scanNumber [start,end]"
 *   start only    -> "scanNumber [start-]"
 *   end only      -> "scanNumber [1,end]"
 */
export function scanWindowFilter(scans: ScansConfig): string | null {
  const { start, end } = scans;
  if (start > 0 && end > 0) return `scanNumber [${start},${end}]`;
  if (start > 0) return `scanNumber [${start}-]`;
  if (end > 0) return `scanNumber [1,${end}]`;
  return null;
}

export interface ConversionArgsInput {
  filterText: string; // e.g. "cv=-45.00"
  scans: ScansConfig;
  inputPath: string;
  outputPath: string;
}

/**
 * 32-bit, zlib-compressed mzML holding only scans whose filter contains filterText
 */
export function buildConversionArgs(input: ConversionArgsInput): string[] {
  const args = [
    "--32",
    "--mzML",
    "--zlib",
    "--filter",
    `thermoScanFilter contains include ${input.filterText}`,
  ];

  const window = scanWindowFilter(input.scans);
  if (window) args.push("--filter", window);

  args.push("--outfile", input.outputPath, input.inputPath);
  return args;
}

/**
 * Input and output paths as passed to the converter
 * Bare names when both live in one directory (the converter runs there), absolute otherwise
 */
export function converterPaths(
  inputPath: string,
  outputPath: string,
): { inputPath: string; outputPath: string } {
  const inputDir = path.dirname(path.resolve(inputPath));
  const outputDir = path.dirname(path.resolve(outputPath));

  if (inputDir === outputDir) {
    return {
      inputPath: path.basename(inputPath),
      outputPath: path.basename(outputPath),
    };
  }
  return {
    inputPath: path.resolve(inputPath),
    outputPath: path.resolve(outputPath),
  };
}

/**
 * Convert the scans of one CV value, then renumber and reindex when enabled
 * Never throws; failures are tracked and reported through the outcome
 */
export async function convertCv(
  ctx: ConversionContext,
  file: InputFileDescriptor,
  cv: number,
  filterText: string,
): Promise<ConversionOutcome> {
  const { config, logger, tracker, converterPath } = ctx;
  if (!converterPath) {
    throw new Error("Converter must be located before converting");
  }

  const outputPath = path.join(
    file.outputDirectory,
    cvOutputFileName(file.baseName, cv, config.output.extension),
  );
  const name = path.basename(converterPath);
  const args = buildConversionArgs({
    filterText,
    scans: config.scans,
    ...converterPaths(file.inputPath, outputPath),
  });

  if (ctx.preview) {
    logger.command(`Preview of call to ${converterPath}`);
    logger.command(formatCommandLine(name, args));

    if (config.output.renumberScans) {
      const { outputPath: renumberedPath } = await renumberScans(outputPath, {
        logger,
        preview: true,
      });
      await reindex(ctx, cv, renumberedPath, outputPath);
    }
    return { cv, outputPath, success: true };
  }

  logger.debug(`Processing file with ${name}`);
  logger.debug(formatCommandLine(name, args));

  const { success, state } = await ctx.runProcess({
    name,
    program: converterPath,
    args,
    workDir: path.dirname(file.inputPath),
    timeoutMinutes: config.converter.timeoutMinutes,
    pollIntervalMs: config.converter.pollIntervalSeconds * 1000,
    echoOutput: config.converter.echoOutput,
  });

  if (!success) {
    tracker.trackProcessFailure(outputPath, cv, state);
    tracker.incrementConversionsFailed();
    return { cv, outputPath, success: false, failedStep: "convert" };
  }

  if (config.output.renumberScans) {
    let renumberedPath: string;
    try {
      const result = await renumberScans(outputPath, { logger });
      renumberedPath = result.outputPath;
      logger.debug(
        `Renumbered ${result.spectraRenumbered} spectra in ${path.basename(outputPath)}`,
      );
    } catch (error) {
      logger.error(`Unable to renumber scans in ${outputPath}`, error);
      tracker.trackConversionIssue(
        outputPath,
        cv,
        "renumber-failed",
        error instanceof Error ? error.message : String(error),
      );
      tracker.incrementConversionsFailed();
      return { cv, outputPath, success: false, failedStep: "renumber" };
    }

    let reindexed: boolean;
    try {
      reindexed = await reindex(ctx, cv, renumberedPath, outputPath);
    } catch (error) {
      logger.error(`Unable to re-index ${outputPath}`, error);
      tracker.trackConversionIssue(
        outputPath,
        cv,
        "reindex-failed",
        error instanceof Error ? error.message : String(error),
      );
      reindexed = false;
    }

    if (!reindexed) {
      tracker.incrementConversionsFailed();
      return { cv, outputPath, success: false, failedStep: "reindex" };
    }
  }

  tracker.incrementConversionsSucceeded();
  return { cv, outputPath, success: true };
}
