/**
 * Locator Module
 * Finds the converter executable before any file is processed
 */

import {
  converterExecutableName,
  findConverter,
  typicalConverterLocations,
} from "../utils/find-converter";
import type { ConversionContext } from "../types";

export class ConverterNotFoundError extends Error {
  constructor(
    readonly executable: string,
    readonly searched: string[],
  ) {
    super(`Unable to find ${executable}, which is installed with ProteoWizard`);
    this.name = "ConverterNotFoundError";
  }
}

/**
 * Writes to context:
 * - converterPath
 */
export async function locate(ctx: ConversionContext): Promise<void> {
  const { config, logger, tracker } = ctx;
  const converterPath = await findConverter(config);

  if (!converterPath) {
    const executable = converterExecutableName();
    const searched = config.converter.path
      ? [config.converter.path]
      : typicalConverterLocations();
    tracker.trackResourceIssue(
      config.converter.path ?? executable,
      "converter-not-found",
    );
    throw new ConverterNotFoundError(executable, searched);
  }

  logger.debug(`Using converter ${converterPath}`);
  ctx.converterPath = converterPath;
}
