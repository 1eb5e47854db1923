/**
 * Processor Module
 * Splits each input file in turn: discover its CV values, then convert them one at a time
 */

import { mkdir } from "node:fs/promises";
import path from "node:path";
import { discoverCvValues } from "./discoverer";
import { convertCv } from "./converter";
import { openScanReader } from "../readers";
import { ScanWarningLedger } from "../utils/warning-ledger";
import { cvOutputFileName, formatCv } from "../utils/format-cv";
import type { ConversionContext, InputFileDescriptor } from "../types";

/**
 * Warn when distinct CV values round to the same output file name
 */
function warnOnNameCollisions(
  ctx: ConversionContext,
  file: InputFileDescriptor,
  cvValues: Iterable<number>,
): void {
  const byName = new Map<string, number>();
  for (const cv of cvValues) {
    const name = cvOutputFileName(file.baseName, cv, ctx.config.output.extension);
    const previous = byName.get(name);
    if (previous !== undefined) {
      ctx.logger.warn(
        `CV values ${formatCv(previous)} and ${formatCv(cv)} both map to ${name}; the later conversion overwrites the earlier one`,
      );
    } else {
      byName.set(name, cv);
    }
  }
}

/**
 * Split one input file
 * Returns true only when every CV value was converted (and renumbered, if enabled)
 */
export async function processFile(
  ctx: ConversionContext,
  file: InputFileDescriptor,
): Promise<boolean> {
  const { config, logger, tracker, preview } = ctx;
  const openReader = ctx.openReader ?? openScanReader;

  try {
    logger.info("");
    logger.info(`Opening ${file.inputPath}`);

    const reader = await openReader(file.inputPath, ctx);

    logger.info("Determining FAIMS CV values");

    const ledger = new ScanWarningLedger();
    const discovery = discoverCvValues(reader, {
      preview,
      logger,
      ledger,
      warnOnMissingScans: config.logging.warnOnMissingScans,
    });

    const skippedScans = ledger.getScans(reader.sourcePath).length;
    if (skippedScans > 0) {
      tracker.addScanWarnings(skippedScans);
      logger.debug(`${skippedScans} scans skipped without a usable cv= value`);
    }
    if (discovery.stoppedEarly) {
      logger.debug(
        `Every CV value was seen more than 50 times within ${discovery.scansExamined} scans; ignoring the remaining scans`,
      );
    }

    const { cvValues } = discovery;
    file.cvCount = cvValues.size;

    if (cvValues.size === 0) {
      logger.warn("File does not have any FAIMS scans with cv= in the scan filter");
      tracker.trackFileIssue(file.inputPath, "no-cv-values");
      return false;
    }

    tracker.addCvValues(cvValues.size);
    warnOnNameCollisions(ctx, file, cvValues.keys());

    if (!preview) {
      await mkdir(file.outputDirectory, { recursive: true });
    }

    logger.info(`Creating ${config.output.extension} files`);

    let successOverall = true;
    let valuesProcessed = 0;
    const outputPaths: string[] = [];

    for (const [cv, filterText] of cvValues) {
      const percentComplete = Math.round((valuesProcessed / cvValues.size) * 100);
      logger.info("");
      logger.info(
        `${percentComplete}% complete: FAIMS compensation voltage ${formatCv(cv)}`,
      );

      const outcome = await convertCv(ctx, file, cv, filterText);
      if (outcome.success) {
        outputPaths.push(outcome.outputPath);
      } else {
        successOverall = false;
      }
      valuesProcessed++;
    }

    file.outputPaths = outputPaths;

    const actionDescription = preview ? "would create" : "created";
    logger.info("");
    logger.info(
      `100% complete: ${actionDescription} ${outputPaths.length} files in ${file.outputDirectory}`,
    );

    return successOverall;
  } catch (error) {
    logger.error(`Error processing ${path.basename(file.inputPath)}`, error);
    tracker.trackError(file.inputPath, error, "file");
    return false;
  }
}

/**
 * Processes the scanned files sequentially
 *
 * Reads from context:
 * - files, searchRoot (scanner output)
 * - converterPath
 *
 * Writes to context:
 * - files[].cvCount, files[].outputPaths, files[].succeeded
 */
export async function process(ctx: ConversionContext): Promise<void> {
  if (!ctx.files) {
    throw new Error("Scanner must run before processor");
  }

  const { files, tracker, logger, config, searchRoot } = ctx;

  if (files.length > 0 && searchRoot) {
    logger.info(`Found ${files.length} files in ${searchRoot}`);
  }

  for (const [position, file] of files.entries()) {
    const success = await processFile(ctx, file);
    file.succeeded = success;

    if (success) {
      tracker.incrementSuccessful();
      continue;
    }

    tracker.incrementFailed();

    const remaining = files.length - position - 1;
    if (!config.input.ignoreErrors && remaining > 0) {
      logger.warn(
        `Stopping after ${file.relativePath} failed; use --ignore-errors to continue with the remaining ${remaining} files`,
      );
      tracker.incrementSkipped(remaining);
      break;
    }
  }
}
