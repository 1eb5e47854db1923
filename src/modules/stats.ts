/**
 * Stats Module
 * Displays processing statistics and issues
 */

import chalk from "chalk";
import type {
  ConversionContext,
  InputFileDescriptor,
  Issue,
  ProcessingStats,
  Tracker,
} from "../types";
import { formatCv } from "../utils/format-cv";

// ============================================================================
// Formatting Helpers
// ============================================================================

/**
 * Format duration in a human-readable way
 */
function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(2)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = (seconds % 60).toFixed(0);
  return `${minutes}m ${remainingSeconds}s`;
}

function progressBar(
  current: number,
  total: number,
  width: number = 24,
): string {
  if (total === 0) return chalk.dim("─".repeat(width));

  const percentage = current / total;
  const filled = Math.round(width * percentage);
  const empty = width - filled;
  const percentText = `${Math.round(percentage * 100)}%`;

  const filledBar = chalk.green("━".repeat(filled));
  const emptyBar = chalk.dim("━".repeat(empty));

  return `${filledBar}${emptyBar} ${chalk.dim(percentText)}`;
}

function statRow(
  icon: string,
  label: string,
  value: string | number,
  color: (s: string) => string = chalk.white,
): string {
  return `   ${icon} ${chalk.dim(label.padEnd(18))} ${color(String(value))}`;
}

function sectionHeader(title: string): string {
  return `\n  ${chalk.bold.white(title)}`;
}

// ============================================================================
// Main Stats Display
// ============================================================================

/**
 * Display processing statistics to console
 */
export function stats(ctx: ConversionContext): void {
  const { tracker, verbose, preview, files = [] } = ctx;

  const stats = tracker.getStats();
  const hasErrors = stats.failedFiles > 0 || stats.conversionsFailed > 0;
  const hasWarnings = stats.skippedFiles > 0 || stats.scanWarnings > 0;

  console.log("");

  const statusIcon = hasErrors
    ? chalk.red("✖")
    : hasWarnings
      ? chalk.yellow("◆")
      : chalk.green("✔");
  const title = preview ? "Preview Complete" : "Conversion Complete";

  console.log(
    `  ${statusIcon} ${chalk.bold(title)} ${chalk.dim("·")} ${chalk.dim(formatDuration(stats.duration))}`,
  );

  displayFilesSection(stats);
  displayConversionsSection(stats);
  if (verbose) displayOutputsSection(files, preview);
  displayIssuesSection(tracker, verbose);

  console.log("");
}

// ============================================================================
// Section Displays
// ============================================================================

function displayFilesSection(stats: ProcessingStats): void {
  console.log(sectionHeader("Files"));
  console.log(`   ${progressBar(stats.successfulFiles, stats.totalFiles)}`);

  const rows: [string, number, (s: string) => string][] = [
    ["Processed", stats.successfulFiles, chalk.green],
    ["Failed", stats.failedFiles, chalk.red],
    ["Skipped", stats.skippedFiles, chalk.yellow],
  ];

  for (const [label, value, color] of rows) {
    // Processed is always shown, the others only when non-zero
    if (value > 0 || label === "Processed") {
      console.log(statRow(color("◉"), label, value, color));
    }
  }
}

function displayConversionsSection(stats: ProcessingStats): void {
  if (stats.cvValuesFound === 0) {
    return;
  }

  console.log(sectionHeader("Compensation voltages"));

  const attempted = stats.conversionsSucceeded + stats.conversionsFailed;
  if (attempted > 0) {
    console.log(`   ${progressBar(stats.conversionsSucceeded, attempted)}`);
  }

  console.log(
    statRow(chalk.cyan("◉"), "CV values", stats.cvValuesFound, chalk.cyan),
  );

  const rows: [string, number, (s: string) => string][] = [
    ["Converted", stats.conversionsSucceeded, chalk.green],
    ["Failed", stats.conversionsFailed, chalk.red],
    ["Scans without CV", stats.scanWarnings, chalk.yellow],
  ];

  for (const [label, value, color] of rows) {
    if (value > 0) {
      console.log(statRow(color("◉"), label, value, color));
    }
  }
}

/**
 * Per input file: CV count and the files written (or that would be)
 */
function displayOutputsSection(
  files: InputFileDescriptor[],
  preview?: boolean,
): void {
  const processed = files.filter((file) => file.succeeded !== undefined);
  if (processed.length === 0) {
    return;
  }

  console.log(sectionHeader(preview ? "Would create" : "Created"));

  for (const file of processed) {
    const icon = file.succeeded ? chalk.green("◉") : chalk.red("◉");
    const cvs = file.cvCount === undefined ? "" : ` (${file.cvCount} CVs)`;
    console.log(`   ${icon} ${file.relativePath}${chalk.dim(cvs)}`);
    for (const outputPath of file.outputPaths ?? []) {
      console.log(`      ${chalk.dim("·")} ${outputPath}`);
    }
  }
}

function describeIssue(issue: Issue): string {
  return issue.type === "conversion"
    ? `CV ${formatCv(issue.cv)}, ${issue.reason}`
    : issue.reason;
}

function displayIssueGroup(
  label: string,
  issues: Issue[],
  color: (s: string) => string,
  verbose?: boolean,
): void {
  if (issues.length === 0) {
    return;
  }

  console.log(statRow(color("✖"), label, issues.length, color));
  if (!verbose) {
    return;
  }

  for (const issue of issues) {
    console.log(
      `      ${chalk.dim("·")} ${issue.path} ${chalk.dim(`(${describeIssue(issue)})`)}`,
    );
    if (issue.details) {
      console.log(`        ${chalk.dim(issue.details)}`);
    }
  }
}

function displayIssuesSection(tracker: Tracker, verbose?: boolean): void {
  if (tracker.getIssues().length === 0) {
    return;
  }

  console.log(sectionHeader(chalk.red("Errors")));

  displayIssueGroup("Files failed", tracker.getIssues("file"), chalk.red, verbose);
  displayIssueGroup(
    "CVs failed",
    tracker.getIssues("conversion"),
    chalk.red,
    verbose,
  );
  displayIssueGroup(
    "Resources failed",
    tracker.getIssues("resource"),
    chalk.yellow,
    verbose,
  );

  if (!verbose) {
    console.log(chalk.dim("   Run with --verbose for details"));
  }
}
