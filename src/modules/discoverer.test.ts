import { describe, it, expect, vi } from "vitest";
import { discoverCvValues, extractCv } from "./discoverer";
import { Logger } from "../utils/logger";
import { ScanWarningLedger } from "../utils/warning-ledger";
import { FakeScanReader, cyclingFilters } from "../testing/context";

function quietLogger() {
  const logger = new Logger("error");
  const warn = vi.spyOn(logger, "warn").mockImplementation(() => {});
  return { logger, warn };
}

describe("extractCv", () => {
  it("returns the value and the matched filter text", () => {
    expect(
      extractCv(1, "ITMS + c NSI cv=-65.00 r d Full ms2 438.7423@cid35.00"),
    ).toEqual({ ok: true, cv: -65, filterTextMatch: "cv=-65.00" });
  });

  it("rejects filter text without cv=", () => {
    expect(extractCv(3, "FTMS + p NSI Full ms")).toEqual({
      ok: false,
      warning: "Scan 3 does not contain cv=; skipping",
      rateLimited: true,
    });
  });

  it("rejects an upper-case CV= marker", () => {
    expect(extractCv(7, "FTMS + p NSI CV=-45.00 Full ms")).toEqual({
      ok: false,
      warning:
        "Scan 7 has cv= in the filter text, but it is not followed by a number: FTMS + p NSI CV=-45.00 Full ms",
      rateLimited: true,
    });
  });

  it("leaves upper-case CV= scans out of the result and records them", () => {
    const { logger } = quietLogger();
    const ledger = new ScanWarningLedger();
    const reader = new FakeScanReader(
      new Map([
        [1, "FTMS + p NSI cv=-45.00 Full ms"],
        [2, "FTMS + p NSI CV=-65.00 Full ms"],
        [3, "FTMS + p NSI cv=-45.00 Full ms"],
      ]),
      1,
      3,
    );

    const discovery = discoverCvValues(reader, { logger, ledger });

    expect([...discovery.cvValues]).toEqual([[-45, "cv=-45.00"]]);
    expect(ledger.getScans(reader.sourcePath)).toEqual([2]);
  });

  it("rejects cv= that is not followed by a number", () => {
    const result = extractCv(4, "FTMS + p NSI cv=abc Full ms");
    expect(result).toEqual({
      ok: false,
      warning:
        "Scan 4 has cv= in the filter text, but it is not followed by a number: FTMS + p NSI cv=abc Full ms",
      rateLimited: true,
    });
  });

  it("rejects numeric-looking text that does not parse", () => {
    expect(extractCv(5, "FTMS cv=1.2.3 Full ms")).toEqual({
      ok: false,
      warning: "Unable to parse the CV value for scan 5: 1.2.3",
      rateLimited: true,
    });
  });

  it("reports missing scans without rate limiting", () => {
    expect(extractCv(9, undefined)).toEqual({
      ok: false,
      warning: "Scan 9 not found; skipping",
      rateLimited: false,
    });
  });
});

describe("discoverCvValues", () => {
  const filters = new Map<number, string>([
    [0, "FTMS + p NSI cv=-99.00 Full ms"],
    [1, "FTMS + p NSI cv=-45.00 Full ms"],
    [2, "ITMS + c NSI cv=-65.00 r d Full ms2 438.7423@cid35.00"],
    [3, "FTMS + p NSI Full ms"],
    [4, "FTMS + p NSI cv=abc Full ms"],
    [5, "FTMS + p NSI cv=1.2.3 Full ms"],
    [6, "ITMS + c NSI cv=-45.00 r d Full ms2 512.2210@cid35.00"],
    [8, "FTMS + p NSI cv=-45.0 Full ms"],
    [9, "FTMS + p NSI cv=-80.00 Full ms"],
    [10, "FTMS + p NSI cv=-30.00 Full ms"],
  ]);

  it("returns the distinct values in first-seen order with their filter text", () => {
    const reader = new FakeScanReader(filters, 1, 9);
    const { logger } = quietLogger();

    const { cvValues, scansExamined, stoppedEarly } = discoverCvValues(reader, {
      logger,
      ledger: new ScanWarningLedger(),
    });

    expect([...cvValues.entries()]).toEqual([
      [-45, "cv=-45.00"],
      [-65, "cv=-65.00"],
      [-80, "cv=-80.00"],
    ]);
    expect(scansExamined).toBe(9);
    expect(stoppedEarly).toBe(false);
  });

  it("never looks at scans outside the reader's range", () => {
    const reader = new FakeScanReader(filters, 1, 9);
    const { logger } = quietLogger();

    discoverCvValues(reader, { logger, ledger: new ScanWarningLedger() });

    expect(reader.visited).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9]);
  });

  it("warns about unusable scans and records them in the ledger", () => {
    const reader = new FakeScanReader(filters, 1, 9);
    const { logger, warn } = quietLogger();
    const ledger = new ScanWarningLedger();

    discoverCvValues(reader, { logger, ledger });

    expect(warn.mock.calls.map(([message]) => message)).toEqual([
      "Scan 3 does not contain cv=; skipping",
      "Scan 4 has cv= in the filter text, but it is not followed by a number: FTMS + p NSI cv=abc Full ms",
      "Unable to parse the CV value for scan 5: 1.2.3",
    ]);
    expect(ledger.getScans("/data/Sample.raw")).toEqual([3, 4, 5]);
  });

  it("warns about missing scans only when asked to", () => {
    const reader = new FakeScanReader(filters, 1, 9);
    const { logger, warn } = quietLogger();

    discoverCvValues(reader, {
      logger,
      ledger: new ScanWarningLedger(),
      warnOnMissingScans: true,
    });

    expect(warn).toHaveBeenCalledWith("Scan 7 not found; skipping");
    expect(warn).toHaveBeenCalledTimes(4);
  });

  it("returns an empty mapping when no scan has a CV value", () => {
    const reader = new FakeScanReader(
      new Map([[1, "FTMS + p NSI Full ms"]]),
      1,
      1,
    );
    const { logger } = quietLogger();

    const { cvValues } = discoverCvValues(reader, {
      logger,
      ledger: new ScanWarningLedger(),
    });

    expect(cvValues.size).toBe(0);
  });

  describe("early stop", () => {
    it("stops in preview mode once every value has been seen more than 50 times", () => {
      // Scans alternate -45, -65; the 51st -65 scan is scan 102
      const reader = new FakeScanReader(
        cyclingFilters(["-45.00", "-65.00"], 1000),
        1,
        1000,
      );
      const { logger } = quietLogger();

      const result = discoverCvValues(reader, {
        preview: true,
        logger,
        ledger: new ScanWarningLedger(),
      });

      expect(result.stoppedEarly).toBe(true);
      expect(result.scansExamined).toBe(102);
      expect(Math.max(...reader.visited)).toBe(102);
      expect([...result.cvValues.keys()]).toEqual([-45, -65]);
    });

    it("scans the full range when not previewing", () => {
      const reader = new FakeScanReader(
        cyclingFilters(["-45.00", "-65.00"], 1000),
        1,
        1000,
      );
      const { logger } = quietLogger();

      const result = discoverCvValues(reader, {
        logger,
        ledger: new ScanWarningLedger(),
      });

      expect(result.stoppedEarly).toBe(false);
      expect(result.scansExamined).toBe(1000);
    });

    it("keeps scanning while any value has 50 or fewer occurrences", () => {
      // -30 appears once, at scan 50, so the early stop never triggers
      const filters = cyclingFilters(["-45.00", "-65.00"], 400);
      filters.set(50, "FTMS + p NSI cv=-30.00 Full ms");
      const reader = new FakeScanReader(filters, 1, 400);
      const { logger } = quietLogger();

      const result = discoverCvValues(reader, {
        preview: true,
        logger,
        ledger: new ScanWarningLedger(),
      });

      expect([...result.cvValues.keys()]).toEqual([-45, -65, -30]);
      expect(result.scansExamined).toBe(400);
      expect(result.stoppedEarly).toBe(false);
    });
  });
});
