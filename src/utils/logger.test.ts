import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { Logger } from "./logger";
import { createLogger, defaultLogFilePath } from "./create-logger";

describe("Logger", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "faims-log-"));
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it("hides messages below its level", () => {
    const logger = new Logger("warn");

    logger.debug("debug message");
    logger.info("info message");
    logger.warn("warn message");

    expect(console.log).not.toHaveBeenCalled();
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it("always shows errors and preview commands", () => {
    const logger = new Logger("error");

    logger.error("failed");
    logger.command("msconvert --32 a.raw");

    expect(console.error).toHaveBeenCalledTimes(1);
    expect(console.log).toHaveBeenCalledTimes(1);
  });

  it("mirrors enabled messages to the log file", async () => {
    const logFile = path.join(dir, "run.txt");
    const logger = new Logger("info", logFile);

    logger.debug("hidden");
    logger.info("Opening /data/a.raw");
    logger.error("Unable to open", new Error("ENOENT"));
    logger.command("not logged");

    const lines = (await readFile(logFile, "utf-8")).trimEnd().split("\n");
    expect(lines.map((line) => line.split("\t").slice(1))).toEqual([
      ["INFO", "Opening /data/a.raw"],
      ["ERROR", "Unable to open: ENOENT"],
    ]);
    expect(logger.logFile).toBe(logFile);
  });
});

describe("createLogger", () => {
  it("names the default log file after the date", () => {
    expect(path.basename(defaultLogFilePath(new Date("2024-03-05T10:00:00Z")))).toBe(
      "faims-split_log_2024-03-05.txt",
    );
  });

  it("skips the log file unless enabled", () => {
    const logger = createLogger({
      level: "info",
      logToFile: false,
      file: "run.txt",
      warnOnMissingScans: false,
    });

    expect(logger.logFile).toBeNull();
  });

  it("resolves a configured log file", () => {
    const logger = createLogger({
      level: "info",
      logToFile: true,
      file: "run.txt",
      warnOnMissingScans: false,
    });

    expect(logger.logFile).toBe(path.resolve("run.txt"));
  });
});
