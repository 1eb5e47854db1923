/**
 * Convert command - Loads config and runs the splitting pipeline
 */

import ora from "ora";
import chalk from "chalk";
import { ZodError } from "zod";
import {
  loadConfig,
  applyOptions,
  createLogger,
  createProcessRunner,
  Tracker,
} from "../../utils";
import * as modules from "../../modules";
import { ConvertOptionsSchema } from "../../types";
import type { ConversionContext } from "../../types";

export async function convertCommand(
  inputArgument: string | undefined,
  opts: unknown,
): Promise<void> {
  const spinner = ora({ text: "Initializing...", indent: 2 }).start();

  try {
    // Validate CLI options
    const options = ConvertOptionsSchema.parse(opts);

    // Load configuration (default → user → custom), then apply CLI options
    const { config: loaded, errors, sources } = await loadConfig(options.config);
    const config = applyOptions(loaded, {
      ...options,
      input: inputArgument ?? options.input,
    });

    const logger = createLogger(config.logging);
    const tracker = new Tracker();

    // Add any config loading errors to tracker
    for (const err of errors) {
      tracker.trackError(err.path, err.error, "resource");
    }

    const ctx: ConversionContext = {
      config,
      logger,
      tracker,
      runProcess: createProcessRunner(logger),
      preview: options.preview,
      verbose: options.verbose,
    };

    spinner.text = "Locating converter...";
    await modules.locate(ctx);

    spinner.text = "Scanning input files...";
    await modules.scan(ctx);

    // Converter output is echoed to the console from here on
    spinner.stop();

    for (const err of errors) {
      logger.warn(`Ignoring config file ${err.path}; using the remaining settings`);
    }
    for (const source of sources) {
      logger.debug(`Using config file ${source}`);
    }
    if (logger.logFile) {
      logger.info(`Logging to ${logger.logFile}`);
    }
    if (ctx.files?.length === 0) {
      logger.warn(`No files matched ${config.input.path}`);
    }

    await modules.process(ctx);

    modules.stats(ctx);

    const { totalFiles, successfulFiles } = tracker.getStats();
    if (totalFiles === 0 || successfulFiles < totalFiles) {
      process.exitCode = 1;
    }
  } catch (error) {
    spinner.fail("Conversion failed");

    if (error instanceof modules.ConverterNotFoundError) {
      console.error(chalk.red(error.message));
      console.error("Typical locations for ProteoWizard:");
      for (const location of error.searched) {
        console.error(`  ${location}`);
      }
      console.error("Set converter.path in the config file to use another location.");
    } else if (error instanceof ZodError) {
      for (const issue of error.issues) {
        console.error(chalk.red(`${issue.path.join(".")}: ${issue.message}`));
      }
    } else {
      console.error(error);
    }
    process.exit(1);
  }
}
