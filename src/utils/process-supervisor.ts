/**
 * Process Supervisor
 * Launches an external command, polls it until it exits or its timeout
 * elapses, and kills it on timeout
 */

import { spawn, type ChildProcess } from "node:child_process";
import { setTimeout as sleep } from "node:timers/promises";
import type {
  FinalProcessState,
  ProcessRequest,
  ProcessResult,
  ProcessRunner,
  ProcessState,
} from "../types";
import type { Logger } from "./logger";

export const DEFAULT_POLL_INTERVAL_MS = 2000;

type ExitInfo =
  | { code: number | null; signal: NodeJS.Signals | null }
  | { error: Error };

export class ProcessSupervisor {
  private currentState: ProcessState = { kind: "idle" };

  constructor(
    private request: ProcessRequest,
    private logger: Logger,
  ) {}

  get state(): ProcessState {
    return this.currentState;
  }

  /**
   * Run the command to completion
   * Never throws: launch errors become a "launch-failed" state
   */
  async run(): Promise<ProcessResult> {
    const {
      name,
      program,
      args,
      workDir,
      timeoutMinutes,
      pollIntervalMs = DEFAULT_POLL_INTERVAL_MS,
      echoOutput = true,
    } = this.request;

    if (this.currentState.kind !== "idle") {
      throw new Error(`${name} has already been started`);
    }

    // Filled in by the child's events; read by the polling loop
    const status: { exit?: ExitInfo } = {};
    let child: ChildProcess;

    try {
      // Output goes straight to our console; nothing is buffered here
      child = spawn(program, args, {
        cwd: workDir,
        stdio: echoOutput ? ["ignore", "inherit", "inherit"] : "ignore",
        windowsHide: true,
      });
    } catch (error) {
      return this.finish({
        kind: "launch-failed",
        error: error instanceof Error ? error : new Error(String(error)),
      });
    }

    child.once("error", (error) => {
      status.exit ??= { error };
    });
    child.once("exit", (code, signal) => {
      status.exit ??= { code, signal };
    });

    const startedAt = Date.now();
    this.currentState = { kind: "running", pid: child.pid, startedAt };

    const limitMs = timeoutMinutes > 0 ? timeoutMinutes * 60_000 : Infinity;

    while (!status.exit) {
      await sleep(pollIntervalMs);

      if (!status.exit && Date.now() - startedAt >= limitMs) {
        await this.kill(child);
        this.logger.error(
          `${name} runtime surpassed ${timeoutMinutes} minutes; aborting. ` +
            `Use --timeout to allow ${name} to run longer, e.g. --timeout ${Math.max(10, Math.ceil(timeoutMinutes * 2))}`,
        );
        return this.finish({ kind: "timed-out", timeoutMinutes });
      }
    }

    const exit = status.exit;

    if ("error" in exit) {
      this.logger.error(`Unable to start ${name} (${program})`, exit.error);
      return this.finish({ kind: "launch-failed", error: exit.error });
    }

    const result = this.finish({
      kind: "completed",
      exitCode: exit.code,
      signal: exit.signal,
    });

    if (!result.success) {
      const code = exit.code ?? exit.signal ?? "unknown";
      this.logger.warn(`${name} reported a non-zero return code: ${code}`);
    }

    return result;
  }

  private async kill(child: ChildProcess): Promise<void> {
    const exited = new Promise<void>((resolve) => {
      child.once("exit", () => resolve());
    });
    child.kill("SIGKILL");
    await exited;
  }

  private finish(state: FinalProcessState): ProcessResult {
    this.currentState = state;
    return {
      success: state.kind === "completed" && state.exitCode === 0,
      state,
    };
  }
}

/**
 * ProcessRunner backed by a fresh ProcessSupervisor per call
 */
export function createProcessRunner(logger: Logger): ProcessRunner {
  return (request) => new ProcessSupervisor(request, logger).run();
}
