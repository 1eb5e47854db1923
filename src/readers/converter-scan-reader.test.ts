import { describe, it, expect, vi } from "vitest";
import { writeFile } from "node:fs/promises";
import { fileExists } from "../utils/file-exists";
import { buildMetadataArgs, openConverterScanReader } from "./converter-scan-reader";
import { createTestContext } from "../testing/context";
import type { ProcessRunner } from "../types";

describe("buildMetadataArgs", () => {
  it("keeps one peak per spectrum and skips the index", () => {
    expect(buildMetadataArgs("/data/Sample.raw", "/tmp/x/scan-metadata.mzML")).toEqual([
      "--mzML",
      "--noindex",
      "--filter",
      "threshold count 1 most-intense",
      "--outfile",
      "/tmp/x/scan-metadata.mzML",
      "/data/Sample.raw",
    ]);
  });
});

describe("openConverterScanReader", () => {
  it("reads the metadata file written by the converter and removes it", async () => {
    let metadataPath = "";
    const runProcess = vi.fn<ProcessRunner>(async (request) => {
      metadataPath = request.args[request.args.indexOf("--outfile") + 1];
      await writeFile(
        metadataPath,
        [
          '<spectrum index="0" id="controllerType=0 controllerNumber=1 scan=1" defaultArrayLength="1">',
          '  <cvParam cvRef="MS" accession="MS:1000512" name="filter string" value="FTMS + p NSI cv=-45.00 Full ms"/>',
          "</spectrum>",
        ].join("\n"),
      );
      return { success: true, state: { kind: "completed", exitCode: 0, signal: null } };
    });
    const ctx = createTestContext({ runProcess });
    const debug = vi.spyOn(ctx.logger, "debug");

    const reader = await openConverterScanReader("/data/Sample.raw", ctx);

    expect(reader.sourcePath).toBe("/data/Sample.raw");
    expect(reader.lookupFilterText(1)).toBe("FTMS + p NSI cv=-45.00 Full ms");
    expect(runProcess.mock.calls[0][0].args.at(-1)).toBe("/data/Sample.raw");
    expect(await fileExists(metadataPath)).toBe(false);
    expect(debug).toHaveBeenLastCalledWith("Read filter text for 1 scans (1-1)");
  });

  it("fails when the converter fails", async () => {
    const runProcess = vi.fn<ProcessRunner>(async () => ({
      success: false,
      state: { kind: "completed", exitCode: 1, signal: null },
    }));
    const ctx = createTestContext({ runProcess });

    await expect(openConverterScanReader("/data/Sample.raw", ctx)).rejects.toThrow(
      "Unable to extract scan filters from /data/Sample.raw",
    );
  });
});
