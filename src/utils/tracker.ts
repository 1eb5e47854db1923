/**
 * Conversion Tracker
 * Unified tracking for stats and issues
 */

import { ZodError } from "zod";
import type { FinalProcessState } from "../types/process";

// ============================================================================
// Types
// ============================================================================

// Type-safe reasons for each issue type
export type FileIssueReason =
  | "no-cv-values"
  | "not-found"
  | "read-error"
  | "unexpected-error";
export type ConversionIssueReason =
  | "launch-failed"
  | "timeout"
  | "exit-code"
  | "renumber-failed"
  | "reindex-failed";
export type ResourceIssueReason =
  | "invalid-json"
  | "schema-validation"
  | "read-error"
  | "converter-not-found";

// Discriminated union - each type has its own subset of reasons
export interface FileIssue {
  type: "file";
  path: string;
  reason: FileIssueReason;
  details?: string;
}

export interface ConversionIssue {
  type: "conversion";
  path: string; // Output file of the failed CV
  cv: number;
  reason: ConversionIssueReason;
  details?: string;
}

export interface ResourceIssue {
  type: "resource";
  path: string;
  reason: ResourceIssueReason;
  details?: string;
}

export type Issue = FileIssue | ConversionIssue | ResourceIssue;
export type IssueType = Issue["type"];

export interface ProcessingStats {
  // File counts
  totalFiles: number;
  successfulFiles: number;
  failedFiles: number;
  skippedFiles: number;

  // Per-CV counts
  cvValuesFound: number;
  conversionsSucceeded: number;
  conversionsFailed: number;

  scanWarnings: number;
  issues: Issue[];
  duration: number;
}

// ============================================================================
// Error Mapping (private)
// ============================================================================

interface IssueInfo<T> {
  reason: T;
  details: string;
}

function mapResourceError(error: unknown): IssueInfo<ResourceIssueReason> {
  if (error instanceof ZodError) {
    return {
      reason: "schema-validation",
      details: error.issues
        .map((e) => `${e.path.join(".")}: ${e.message}`)
        .join("; "),
    };
  }
  if (error instanceof SyntaxError) {
    return {
      reason: "invalid-json",
      details: error.message,
    };
  }
  return {
    reason: "read-error",
    details: error instanceof Error ? error.message : String(error),
  };
}

function mapFileError(error: unknown): IssueInfo<FileIssueReason> {
  const details = error instanceof Error ? error.message : String(error);

  if (error instanceof Error && "code" in error) {
    if (error.code === "ENOENT") {
      return { reason: "not-found", details };
    }
    if (error.code === "EACCES" || error.code === "EPERM") {
      return { reason: "read-error", details };
    }
  }

  return { reason: "unexpected-error", details };
}

/**
 * Short description of how an external command ended
 */
export function describeProcessState(state: FinalProcessState): string {
  switch (state.kind) {
    case "launch-failed":
      return state.error.message;
    case "timed-out":
      return `exceeded ${state.timeoutMinutes} minutes`;
    case "completed":
      return state.exitCode === null
        ? `terminated by ${state.signal ?? "unknown signal"}`
        : `exit code ${state.exitCode}`;
  }
}

function mapProcessState(
  state: FinalProcessState,
): IssueInfo<ConversionIssueReason> | null {
  const details = describeProcessState(state);
  switch (state.kind) {
    case "launch-failed":
      return { reason: "launch-failed", details };
    case "timed-out":
      return { reason: "timeout", details };
    case "completed":
      return state.exitCode === 0 ? null : { reason: "exit-code", details };
  }
}

// ============================================================================
// Tracker Class
// ============================================================================

export class Tracker {
  private totalFiles = 0;
  private successfulFiles = 0;
  private failedFiles = 0;
  private skippedFiles = 0;
  private cvValuesFound = 0;
  private conversionsSucceeded = 0;
  private conversionsFailed = 0;
  private scanWarnings = 0;
  private issues: Issue[] = [];
  private startTime = new Date();

  // ============================================================================
  // Stat counters
  // ============================================================================

  setTotalFiles(count: number): void {
    this.totalFiles = count;
  }

  incrementSuccessful(): void {
    this.successfulFiles++;
  }

  incrementFailed(): void {
    this.failedFiles++;
  }

  incrementSkipped(count = 1): void {
    this.skippedFiles += count;
  }

  addCvValues(count: number): void {
    this.cvValuesFound += count;
  }

  incrementConversionsSucceeded(): void {
    this.conversionsSucceeded++;
  }

  incrementConversionsFailed(): void {
    this.conversionsFailed++;
  }

  addScanWarnings(count: number): void {
    this.scanWarnings += count;
  }

  // ============================================================================
  // Issue tracking
  // ============================================================================

  /**
   * Track an issue from an error, auto-detecting the reason based on error type
   */
  trackError(path: string, error: unknown, type: "file" | "resource"): void {
    switch (type) {
      case "file": {
        const { reason, details } = mapFileError(error);
        this.issues.push({ type: "file", path, reason, details });
        break;
      }
      case "resource": {
        const { reason, details } = mapResourceError(error);
        this.issues.push({ type: "resource", path, reason, details });
        break;
      }
    }
  }

  trackFileIssue(path: string, reason: FileIssueReason, details?: string): void {
    this.issues.push({ type: "file", path, reason, details });
  }

  trackResourceIssue(
    path: string,
    reason: ResourceIssueReason,
    details?: string,
  ): void {
    this.issues.push({ type: "resource", path, reason, details });
  }

  trackConversionIssue(
    path: string,
    cv: number,
    reason: ConversionIssueReason,
    details?: string,
  ): void {
    this.issues.push({ type: "conversion", path, cv, reason, details });
  }

  /**
   * Track a failed converter call; successful states are ignored
   */
  trackProcessFailure(
    path: string,
    cv: number,
    state: FinalProcessState,
  ): void {
    const info = mapProcessState(state);
    if (info) this.trackConversionIssue(path, cv, info.reason, info.details);
  }

  // ============================================================================
  // Issue getters
  // ============================================================================

  getIssues(): Issue[];
  getIssues<T extends IssueType>(type: T): Extract<Issue, { type: T }>[];
  getIssues(type?: IssueType): Issue[] {
    if (!type) return this.issues;
    return this.issues.filter((i) => i.type === type);
  }

  // ============================================================================
  // Results
  // ============================================================================

  getStats(): ProcessingStats {
    const endTime = new Date();
    const duration = endTime.getTime() - this.startTime.getTime();

    return {
      totalFiles: this.totalFiles,
      successfulFiles: this.successfulFiles,
      failedFiles: this.failedFiles,
      skippedFiles: this.skippedFiles,
      cvValuesFound: this.cvValuesFound,
      conversionsSucceeded: this.conversionsSucceeded,
      conversionsFailed: this.conversionsFailed,
      scanWarnings: this.scanWarnings,
      issues: this.issues,
      duration,
    };
  }
}
