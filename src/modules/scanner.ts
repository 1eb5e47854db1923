/**
 * Scanner Module
 * Resolves the input path (file, directory or wildcard) into the list of files to split
 */

import glob from "fast-glob";
import { stat } from "node:fs/promises";
import path from "node:path";
import type { ConversionContext, InputConfig, InputFileDescriptor } from "../types";

const WILDCARD = /[*?]/;

interface SearchPlan {
  root: string;
  patterns: string[];
}

async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await stat(target)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Turn the input path into a search root plus fast-glob name patterns
 * - directory:        every file with a configured extension
 * - "dir/*.raw":      the wildcard as given
 * - "dir/Sample.raw": that file name, with glob characters escaped
 */
async function planSearch(input: InputConfig): Promise<SearchPlan> {
  const resolved = path.resolve(input.path);

  let root: string;
  let names: string[];

  if (await isDirectory(resolved)) {
    root = resolved;
    names = input.extensions.map((ext) => `*${glob.escapePath(ext)}`);
  } else {
    root = path.dirname(resolved);
    const name = path.basename(resolved);
    names = [WILDCARD.test(name) ? name : glob.escapePath(name)];
  }

  const patterns = input.recurse ? names.map((name) => `**/${name}`) : names;
  return { root, patterns };
}

/**
 * fast-glob depth for the configured recursion levels
 * 0 = unlimited, 1 = input directory only, 2 = one level of subdirectories, ...
 * fast-glob reads directories whose level is below `deep`, and root files are always read
 */
export function recursionDepth(input: InputConfig): number {
  if (!input.recurse) return 0;
  return input.recurseLevels === 0 ? Infinity : input.recurseLevels;
}

/**
 * Scans the input path for files to process and populates context
 *
 * Writes to context:
 * - files: input files in sorted order, with their output directories
 * - searchRoot: directory the patterns were matched under
 */
export async function scan(ctx: ConversionContext): Promise<void> {
  const { input, output } = ctx.config;

  if (!input.path.trim()) {
    throw new Error("Input path must be provided and non-empty");
  }

  const { root, patterns } = await planSearch(input);

  const matches = await glob(patterns, {
    cwd: root,
    absolute: true,
    onlyFiles: true,
    caseSensitiveMatch: false,
    deep: recursionDepth(input),
  });

  const sorted = matches
    .map((match) => path.normalize(match))
    .sort((a, b) => a.localeCompare(b));

  const outputRoot = output.directory ? path.resolve(output.directory) : null;

  const files: InputFileDescriptor[] = sorted.map((inputPath) => {
    const relativePath = path.relative(root, inputPath);
    const baseName = path.basename(inputPath, path.extname(inputPath));

    // Recursed files keep their subdirectory below the output directory
    const outputDirectory = outputRoot
      ? path.join(outputRoot, path.dirname(relativePath))
      : path.dirname(inputPath);

    return { inputPath, relativePath, baseName, outputDirectory };
  });

  ctx.tracker.setTotalFiles(files.length);
  ctx.files = files;
  ctx.searchRoot = root;
}
