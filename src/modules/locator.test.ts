import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { ConverterNotFoundError, locate } from "./locator";
import { createTestContext, testConfig } from "../testing/context";

describe("locate", () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "faims-locate-"));
    await writeFile(path.join(dir, "msconvert"), "");
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("stores the configured converter", async () => {
    const configured = path.join(dir, "msconvert");
    const ctx = createTestContext({
      config: testConfig({ converter: { path: configured } }),
      converterPath: undefined,
    });

    await locate(ctx);

    expect(ctx.converterPath).toBe(configured);
  });

  it("fails with the searched locations", async () => {
    const missing = path.join(dir, "missing", "msconvert");
    const ctx = createTestContext({
      config: testConfig({ converter: { path: missing } }),
      converterPath: undefined,
    });

    const error = await locate(ctx).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConverterNotFoundError);
    expect(error).toMatchObject({ searched: [missing] });
    expect(ctx.converterPath).toBeUndefined();
    expect(ctx.tracker.getIssues("resource")[0]).toMatchObject({
      path: missing,
      reason: "converter-not-found",
    });
  });
});
