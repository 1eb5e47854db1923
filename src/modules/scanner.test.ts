import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { recursionDepth, scan } from "./scanner";
import { createTestContext, testConfig } from "../testing/context";
import type { InputConfig, PartialConversionConfig } from "../types";

describe("recursionDepth", () => {
  const base: InputConfig = {
    path: "",
    extensions: [".raw"],
    recurse: true,
    recurseLevels: 0,
    ignoreErrors: false,
  };

  it("is zero without recursion", () => {
    expect(recursionDepth({ ...base, recurse: false, recurseLevels: 3 })).toBe(0);
  });

  it("is unlimited for zero levels", () => {
    expect(recursionDepth(base)).toBe(Infinity);
  });

  it("follows the configured levels", () => {
    expect(recursionDepth({ ...base, recurseLevels: 2 })).toBe(2);
  });
});

describe("scan", () => {
  let root: string;

  beforeAll(async () => {
    root = await mkdtemp(path.join(tmpdir(), "faims-scan-"));
    await mkdir(path.join(root, "sub", "deeper"), { recursive: true });
    for (const name of ["a.raw", "b.RAW", "c.txt", "sub/d.raw", "sub/deeper/e.raw"]) {
      await writeFile(path.join(root, name), "");
    }
  });

  afterAll(async () => {
    await rm(root, { recursive: true, force: true });
  });

  async function scanWith(config: PartialConversionConfig) {
    const ctx = createTestContext({ config: testConfig(config) });
    await scan(ctx);
    return ctx;
  }

  function relativePaths(ctx: { files?: { relativePath: string }[] }): string[] {
    return (ctx.files ?? []).map((f) => f.relativePath).sort();
  }

  it("finds matching files in a directory, ignoring extension case", async () => {
    const ctx = await scanWith({ input: { path: root } });

    expect(ctx.files?.map((f) => f.relativePath)).toEqual(["a.raw", "b.RAW"]);
    expect(ctx.searchRoot).toBe(root);
    expect(ctx.tracker.getStats().totalFiles).toBe(2);
  });

  it("describes each file", async () => {
    const ctx = await scanWith({ input: { path: root } });

    expect(ctx.files?.[0]).toEqual({
      inputPath: path.join(root, "a.raw"),
      relativePath: "a.raw",
      baseName: "a",
      outputDirectory: root,
    });
  });

  it("recurses without limit", async () => {
    const ctx = await scanWith({ input: { path: root, recurse: true } });

    expect(relativePaths(ctx)).toEqual(
      ["a.raw", "b.RAW", path.join("sub", "d.raw"), path.join("sub", "deeper", "e.raw")].sort(),
    );
  });

  it("limits recursion to the configured levels", async () => {
    const ctx = await scanWith({
      input: { path: root, recurse: true, recurseLevels: 2 },
    });

    expect(relativePaths(ctx)).toEqual(["a.raw", "b.RAW", path.join("sub", "d.raw")].sort());
  });

  it("treats one level as the input directory only", async () => {
    const ctx = await scanWith({
      input: { path: root, recurse: true, recurseLevels: 1 },
    });

    expect(relativePaths(ctx)).toEqual(["a.raw", "b.RAW"]);
  });

  it("matches a wildcard input path", async () => {
    const ctx = await scanWith({ input: { path: path.join(root, "*.txt") } });

    expect(relativePaths(ctx)).toEqual(["c.txt"]);
  });

  it("matches a single file", async () => {
    const ctx = await scanWith({ input: { path: path.join(root, "sub", "d.raw") } });

    expect(ctx.files?.map((f) => f.inputPath)).toEqual([path.join(root, "sub", "d.raw")]);
    expect(ctx.searchRoot).toBe(path.join(root, "sub"));
  });

  it("mirrors subdirectories below the output directory", async () => {
    const out = path.join(root, "out");
    const ctx = await scanWith({
      input: { path: root, recurse: true, recurseLevels: 2 },
      output: { directory: out },
    });

    const sub = ctx.files?.find((f) => f.baseName === "d");
    expect(sub?.outputDirectory).toBe(path.join(out, "sub"));
    const top = ctx.files?.find((f) => f.baseName === "a");
    expect(top?.outputDirectory).toBe(out);
  });

  it("finds nothing for a missing file", async () => {
    const ctx = await scanWith({ input: { path: path.join(root, "missing.raw") } });

    expect(ctx.files).toEqual([]);
  });

  it("rejects an empty input path", async () => {
    await expect(scanWith({ input: { path: "  " } })).rejects.toThrow(
      "Input path must be provided and non-empty",
    );
  });
});
