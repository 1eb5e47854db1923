/**
 * External process supervision types
 */

export type ProcessState =
  | { kind: "idle" }
  | { kind: "running"; pid: number | undefined; startedAt: number }
  | {
      kind: "completed";
      exitCode: number | null;
      signal: NodeJS.Signals | null;
    }
  | { kind: "timed-out"; timeoutMinutes: number }
  | { kind: "launch-failed"; error: Error };

export type FinalProcessState = Exclude<
  ProcessState,
  { kind: "idle" } | { kind: "running" }
>;

export interface ProcessRequest {
  name: string; // Display name used in log messages, e.g. "msconvert"
  program: string;
  args: string[];
  workDir?: string;
  // Zero or less runs without a limit
  timeoutMinutes: number;
  pollIntervalMs?: number;
  echoOutput?: boolean;
}

export interface ProcessResult {
  success: boolean;
  state: FinalProcessState;
}

/**
 * Runs one external command to completion
 * The supervisor implements this; tests substitute fakes
 */
export type ProcessRunner = (request: ProcessRequest) => Promise<ProcessResult>;
