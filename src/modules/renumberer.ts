/**
 * Renumberer Module
 * Rewrites spectrum indices and scan numbers of a converter-written mzML file
 * into a contiguous sequence, dropping the stale offset index
 */

import { createReadStream, createWriteStream } from "node:fs";
import { rm } from "node:fs/promises";
import { once } from "node:events";
import { finished } from "node:stream/promises";
import { createInterface } from "node:readline";
import path from "node:path";
import { renumberedFilePath } from "../utils/format-cv";
import type { Logger } from "../utils/logger";

// <spectrum index="12" id="controllerType=0 controllerNumber=1 scan=13" defaultArrayLength="...">
const SPECTRUM_LINE =
  /^(\s*<spectrum index=")\d+(" id="controllerType=\d+ controllerNumber=\d+ scan=)\d+(.*)$/;
const SPECTRUM_PREFIX = "<spectrum ";
const WRAPPER_OPEN = "<indexedmzML";
const WRAPPER_CLOSE = "</indexedmzML>";
// Everything after the closing mzML tag is the offset index regenerated by the reindexer
const CONTENT_CLOSE = "</mzML>";

export const NEWLINE = "\n";

export class ScanRenumberError extends Error {
  constructor(
    readonly filePath: string,
    readonly lineNumber: number,
    readonly line: string,
  ) {
    super(
      `Unexpected spectrum line format at line ${lineNumber} of ${path.basename(filePath)}: ${line.trim()}`,
    );
    this.name = "ScanRenumberError";
  }
}

export interface RenumberState {
  nextIndex: number; // 0-based spectrum index
  nextScan: number; // 1-based scan number
  wrapperSkipped: boolean;
  finished: boolean; // Set once the closing tag is reached; later input is discarded
  lineNumber: number;
}

export function createRenumberState(): RenumberState {
  return {
    nextIndex: 0,
    nextScan: 1,
    wrapperSkipped: false,
    finished: false,
    lineNumber: 0,
  };
}

/**
 * Rewrite a single line
 * Returns the line to write, or null when the line is dropped
 * Throws ScanRenumberError for a spectrum line of unknown shape
 */
export function renumberLine(
  line: string,
  state: RenumberState,
  filePath: string,
): string | null {
  state.lineNumber++;
  if (state.finished) return null;

  const trimmed = line.trim();

  if (!state.wrapperSkipped && trimmed.startsWith(WRAPPER_OPEN)) {
    state.wrapperSkipped = true;
    return null;
  }

  if (trimmed === WRAPPER_CLOSE) {
    state.finished = true;
    return null;
  }

  if (trimmed === CONTENT_CLOSE) {
    state.finished = true;
    return line;
  }

  const match = SPECTRUM_LINE.exec(line);
  if (match) {
    const rewritten = `${match[1]}${state.nextIndex}${match[2]}${state.nextScan}${match[3]}`;
    state.nextIndex++;
    state.nextScan++;
    return rewritten;
  }

  if (trimmed.startsWith(SPECTRUM_PREFIX)) {
    throw new ScanRenumberError(filePath, state.lineNumber, line);
  }

  return line;
}

export interface RenumberOptions {
  logger: Logger;
  preview?: boolean;
  // Defaults to "<name>_renumbered<ext>" beside the source
  outputPath?: string;
}

export interface RenumberResult {
  sourcePath: string;
  outputPath: string;
  spectraRenumbered: number;
}

/**
 * Stream sourcePath into its renumbered sibling
 * A failed run leaves no output file behind
 */
export async function renumberScans(
  sourcePath: string,
  options: RenumberOptions,
): Promise<RenumberResult> {
  const { logger, preview = false } = options;
  const outputPath = options.outputPath ?? renumberedFilePath(sourcePath);

  if (preview) {
    logger.command(
      `Would renumber the spectra in ${path.basename(sourcePath)}, creating ${path.basename(outputPath)}`,
    );
    return { sourcePath, outputPath, spectraRenumbered: 0 };
  }

  logger.debug(`Renumbering scans in ${path.basename(sourcePath)}`);

  const input = createReadStream(sourcePath, { encoding: "utf-8" });
  const output = createWriteStream(outputPath, { encoding: "utf-8" });
  const lines = createInterface({ input, crlfDelay: Infinity });
  const state = createRenumberState();

  // Write errors surface through once()/finished() below
  output.on("error", (error) => {
    logger.debug(`Writing ${path.basename(outputPath)} failed: ${error.message}`);
  });

  try {
    for await (const line of lines) {
      const rewritten = renumberLine(line, state, sourcePath);
      if (output.errored) throw output.errored;
      if (rewritten !== null && !output.write(rewritten + NEWLINE)) {
        await once(output, "drain");
      }
      if (state.finished) break;
    }

    output.end();
    await finished(output);
  } catch (error) {
    output.destroy();
    if (!output.closed) await once(output, "close");
    await rm(outputPath, { force: true });
    throw error;
  } finally {
    lines.close();
    input.destroy();
  }

  return {
    sourcePath,
    outputPath,
    spectraRenumbered: state.nextIndex,
  };
}
