#!/usr/bin/env node

/**
 * CLI entry point for the FAIMS CV splitter
 * Handles command-line argument parsing and user interaction
 */

import { Command } from "commander";
import { convertCommand } from "./commands/convert";
import { configCommand } from "./commands/config";

const program = new Command();

program
  .name("faims-split")
  .description(
    "Convert a Thermo .raw file with FAIMS scans into a series of .mzML files, " +
      "one for each FAIMS compensation voltage (CV) value",
  )
  .version("0.1.0")
  // Options after "config" belong to the sub-command
  .enablePositionalOptions();

// Main conversion command (default action)
program
  .argument("[input]", "Input file, directory or wildcard such as *.raw")
  .option("-i, --input <path>", "Input file, directory or wildcard (alternative to the argument)")
  .option("-o, --output <path>", "Output directory; defaults to the directory of each input file")
  .option("-c, --config <path>", "Path to custom config file")
  .option("-t, --timeout <minutes>", "Maximum runtime, in minutes, for each converter call (0 for no limit)")
  .option("-s, --recurse", "Also process files in subdirectories")
  .option(
    "-r, --recurse-levels <levels>",
    "Levels to recurse: 0 for no limit, 1 for the input directory only, 2 for one level of subdirectories",
  )
  .option("--ignore-errors", "Keep processing the remaining files after a failure")
  .option("-l, --log", "Log messages to a file")
  .option("--log-file <path>", "Log file path (implies --log)")
  .option("--preview", "Preview the commands that would be run")
  .option("--renumber", "Renumber spectra in each output file so scan numbers are contiguous")
  .option("--scan-start <scan>", "First scan number to include")
  .option("--scan-end <scan>", "Last scan number to include")
  .option("-v, --verbose", "Verbose output")
  .action(convertCommand);

// Config command - show config location and merged settings
program
  .command("config")
  .description("Show the configuration file location and the effective settings")
  .option("-c, --config <path>", "Path to custom config file")
  .action(configCommand);

await program.parseAsync();
