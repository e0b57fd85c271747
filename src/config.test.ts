import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { loadConfig, parseConfig } from "./config.js";

describe("parseConfig", () => {
  it("fills in defaults", () => {
    expect(parseConfig({})).toEqual({
      ok: true,
      value: {
        maxAttempts: 3,
        retry: { minDelayMs: 200, maxDelayMs: 20_000, jitter: 0.2 },
        timeouts: { providerMs: 30_000, hookMs: 60_000 },
        audit: { store: "jsonl", path: ".lifecycle/audit.jsonl" },
        hook: { sampleSize: 100 },
        logLevel: "info",
      },
    });
  });

  it("picks the default path for the chosen audit store", () => {
    const result = parseConfig({ audit: { store: "sqlite" } });

    expect(result.ok && result.value.audit).toEqual({ store: "sqlite", path: ".lifecycle/audit.db" });
  });

  it("reports every issue with its path", () => {
    const result = parseConfig({ maxAttempts: 0, retry: { minDelayMs: 500, maxDelayMs: 100 }, logLevel: "loud" });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toHaveLength(3);
    expect(result.error[0]).toMatch(/^maxAttempts: /);
    expect(result.error.some((issue) => issue.startsWith("logLevel: "))).toBe(true);
    expect(result.error).toContain("retry.maxDelayMs: maxDelayMs must not be smaller than minDelayMs");
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "lifecycle-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("layers file, environment and overrides in that order", async () => {
    const file = join(dir, "config.json");
    await writeFile(
      file,
      JSON.stringify({ region: "us-west-2", maxAttempts: 5, retry: { minDelayMs: 50 }, hook: { sampleSize: 10 } }),
    );

    const result = await loadConfig({
      file,
      env: { LIFECYCLE_REGION: "eu-central-1", LIFECYCLE_HOOK_FUNCTION: "approve-transitions", LIFECYCLE_MAX_ATTEMPTS: "4" },
      overrides: { maxAttempts: 7 },
    });

    if (!result.ok) throw new Error(result.error.join("\n"));
    expect(result.value.region).toBe("eu-central-1");
    expect(result.value.maxAttempts).toBe(7);
    expect(result.value.retry).toEqual({ minDelayMs: 50, maxDelayMs: 20_000, jitter: 0.2 });
    expect(result.value.hook).toEqual({ functionName: "approve-transitions", sampleSize: 10 });
  });

  it("falls back to AWS_REGION", async () => {
    const result = await loadConfig({ env: { AWS_REGION: "ap-southeast-2" } });

    expect(result.ok && result.value.region).toBe("ap-southeast-2");
  });

  it("rejects a non-numeric attempt count from the environment", async () => {
    const result = await loadConfig({ env: { LIFECYCLE_MAX_ATTEMPTS: "many" } });

    expect(result.ok).toBe(false);
    expect(!result.ok && result.error[0]).toMatch(/^maxAttempts: /);
  });

  it("fails on a missing or malformed file", async () => {
    const missing = await loadConfig({ file: join(dir, "absent.json") });
    expect(!missing.ok && missing.error[0]).toMatch(/^Cannot read config file: /);

    const file = join(dir, "broken.json");
    await writeFile(file, "[1, 2]");
    expect(await loadConfig({ file })).toEqual({ ok: false, error: ["Config file must contain a JSON object"] });
  });
});
