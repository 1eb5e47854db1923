/**
 * Reindexer Module
 * Runs the converter over a renumbered file to rebuild its offset index
 */

import { rm } from "node:fs/promises";
import path from "node:path";
import { formatCommandLine } from "../utils/format-command-line";
import { describeProcessState } from "../utils/tracker";
import type { ConversionContext } from "../types";

/**
 * Converter arguments for the reindex pass; no scan filters, those were
 * applied when the file was first written
 */
export function buildReindexArgs(
  sourcePath: string,
  outputPath: string,
): string[] {
  return ["--32", "--mzML", "--zlib", "--outfile", outputPath, sourcePath];
}

/**
 * Rewrite renumberedPath as an indexed file at outputPath
 * The renumbered file is deleted on success and kept for diagnosis on failure
 */
export async function reindex(
  ctx: ConversionContext,
  cv: number,
  renumberedPath: string,
  outputPath: string,
): Promise<boolean> {
  const { config, logger, converterPath } = ctx;
  if (!converterPath) {
    throw new Error("Converter must be located before reindexing");
  }

  const name = path.basename(converterPath);
  const workDir = path.dirname(outputPath);
  // Both files live in the output directory, so bare names are enough
  const args = buildReindexArgs(
    path.basename(renumberedPath),
    path.basename(outputPath),
  );

  if (ctx.preview) {
    logger.command(`Preview of call to ${converterPath}`);
    logger.command(formatCommandLine(name, args));
    return true;
  }

  logger.debug(`Re-indexing ${path.basename(outputPath)}`);
  logger.debug(formatCommandLine(name, args));

  const { success, state } = await ctx.runProcess({
    name,
    program: converterPath,
    args,
    workDir,
    timeoutMinutes: config.converter.timeoutMinutes,
    pollIntervalMs: config.converter.pollIntervalSeconds * 1000,
    echoOutput: config.converter.echoOutput,
  });

  if (!success) {
    ctx.tracker.trackConversionIssue(
      outputPath,
      cv,
      "reindex-failed",
      describeProcessState(state),
    );
    logger.warn(
      `Re-indexing failed; leaving ${path.basename(renumberedPath)} in place`,
    );
    return false;
  }

  await rm(renumberedPath, { force: true });
  return true;
}
