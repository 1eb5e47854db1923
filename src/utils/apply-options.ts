import type { ConversionConfig, ConvertOptions } from "../types";

/**
 * Overlay command-line options on the loaded configuration
 * Only options that were given override config values
 */
export function applyOptions(
  config: ConversionConfig,
  options: ConvertOptions,
): ConversionConfig {
  const logToFile =
    options.log === true || options.logFile !== undefined
      ? true
      : config.logging.logToFile;

  return {
    input: {
      ...config.input,
      path: options.input ?? config.input.path,
      // A recursion depth on its own also turns recursion on
      recurse:
        options.recurse ??
        (options.recurseLevels !== undefined ? true : config.input.recurse),
      recurseLevels: options.recurseLevels ?? config.input.recurseLevels,
      ignoreErrors: options.ignoreErrors ?? config.input.ignoreErrors,
    },
    output: {
      ...config.output,
      directory: options.output ?? config.output.directory,
      renumberScans: options.renumber ?? config.output.renumberScans,
    },
    converter: {
      ...config.converter,
      timeoutMinutes: options.timeout ?? config.converter.timeoutMinutes,
    },
    scans: {
      start: options.scanStart ?? config.scans.start,
      end: options.scanEnd ?? config.scans.end,
    },
    logging: {
      ...config.logging,
      level: options.verbose ? "debug" : config.logging.level,
      logToFile,
      file: options.logFile ?? config.logging.file,
    },
  };
}
