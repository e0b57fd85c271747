import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { AuditLog } from "./audit-log.js";
import { InMemoryAuditStore } from "./memory-store.js";
import { JsonlAuditStore } from "./jsonl-store.js";
import { SQLiteAuditStore } from "./sqlite-store.js";
import type { AuditEntry, AuditQuery, AuditRecord, AuditStore } from "./types.js";
import { silentLogger } from "../logger.js";

function entry(overrides: Partial<AuditEntry> = {}): AuditEntry {
  return {
    timestamp: "2026-03-01T10:00:00.000Z",
    targetKey: "default/media",
    target: { bucket: "media" },
    status: "completed",
    dryRun: false,
    prune: false,
    diff: { toCreate: ["r1"], toUpdate: [], toDelete: [], unchanged: [] },
    outcomes: [{ ruleId: "r1", action: "Created", attempts: 1 }],
    finalStateHash: "abc123",
    durationMs: 42,
    ...overrides,
  };
}

function sequentialIds(): () => string {
  let n = 0;
  return () => `rec-${++n}`;
}

class FailingStore implements AuditStore {
  async append(): Promise<void> {
    throw new Error("disk full");
  }
  async query(): Promise<AuditRecord[]> {
    return [];
  }
  async close(): Promise<void> {}
}

// ─── Shared store behaviour ───────────────────────────────────────────────────

const stores: Array<[string, () => Promise<{ store: AuditStore; cleanup: () => Promise<void> }>]> = [
  ["InMemoryAuditStore", async () => ({ store: new InMemoryAuditStore(), cleanup: async () => {} })],
  [
    "JsonlAuditStore",
    async () => {
      const dir = await mkdtemp(join(tmpdir(), "audit-jsonl-"));
      return {
        store: new JsonlAuditStore(join(dir, "nested", "audit.jsonl")),
        cleanup: () => rm(dir, { recursive: true, force: true }),
      };
    },
  ],
  ["SQLiteAuditStore", async () => ({ store: new SQLiteAuditStore(":memory:"), cleanup: async () => {} })],
];

describe.each(stores)("%s", (_name, open) => {
  let store: AuditStore;
  let cleanup: () => Promise<void>;
  let log: AuditLog;

  beforeEach(async () => {
    ({ store, cleanup } = await open());
    log = new AuditLog(store, silentLogger, { newId: sequentialIds() });
  });

  afterEach(async () => {
    await store.close();
    await cleanup();
  });

  async function ids(filter?: AuditQuery): Promise<string[]> {
    return (await log.query(filter)).map((r) => r.id);
  }

  it("returns the stored record with its id", async () => {
    const result = await log.record(entry());

    expect(result).toEqual({ ok: true, value: { id: "rec-1", ...entry() } });
    expect(await log.query()).toEqual([{ id: "rec-1", ...entry() }]);
  });

  it("lists records newest first", async () => {
    await log.record(entry({ timestamp: "2026-03-01T10:00:00.000Z" }));
    await log.record(entry({ timestamp: "2026-03-03T10:00:00.000Z" }));
    await log.record(entry({ timestamp: "2026-03-02T10:00:00.000Z" }));
    await log.record(entry({ timestamp: "2026-03-02T10:00:00.000Z" }));

    expect(await ids()).toEqual(["rec-2", "rec-4", "rec-3", "rec-1"]);
  });

  it("filters by target, status and time, and honours the limit", async () => {
    await log.record(entry({ timestamp: "2026-03-01T00:00:00.000Z" }));
    await log.record(entry({ timestamp: "2026-03-02T00:00:00.000Z", status: "fetch-failed", outcomes: [] }));
    await log.record(
      entry({ timestamp: "2026-03-03T00:00:00.000Z", targetKey: "eu-west-1/logs", target: { bucket: "logs", region: "eu-west-1" } }),
    );
    await log.record(entry({ timestamp: "2026-03-04T00:00:00.000Z" }));

    expect(await ids({ targetKey: "default/media" })).toEqual(["rec-4", "rec-2", "rec-1"]);
    expect(await ids({ status: "fetch-failed" })).toEqual(["rec-2"]);
    expect(await ids({ since: "2026-03-03T00:00:00.000Z" })).toEqual(["rec-4", "rec-3"]);
    expect(await ids({ targetKey: "default/media", status: "completed", limit: 1 })).toEqual(["rec-4"]);
  });
});

// ─── AuditLog ─────────────────────────────────────────────────────────────────

describe("AuditLog", () => {
  it("returns a LogError instead of throwing when the store fails", async () => {
    const log = new AuditLog(new FailingStore(), silentLogger, { newId: sequentialIds() });

    const result = await log.record(entry());

    expect(result).toEqual({ ok: false, error: { kind: "LogError", message: "disk full" } });
  });

  it("assigns random ids by default", async () => {
    const log = new AuditLog(new InMemoryAuditStore(), silentLogger);

    const first = await log.record(entry());
    const second = await log.record(entry());

    expect(first.ok && second.ok && first.value.id !== second.value.id).toBe(true);
  });
});

// ─── JSON lines format ────────────────────────────────────────────────────────

describe("JsonlAuditStore", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "audit-jsonl-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("appends one JSON document per line", async () => {
    const file = join(dir, "audit.jsonl");
    const log = new AuditLog(new JsonlAuditStore(file), silentLogger, { newId: sequentialIds() });

    await log.record(entry());
    await log.record(entry({ status: "busy", outcomes: [] }));

    const lines = (await readFile(file, "utf8")).trimEnd().split("\n");
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[1] ?? "")).toMatchObject({ id: "rec-2", status: "busy" });
  });

  it("reads nothing from a missing file", async () => {
    const store = new JsonlAuditStore(join(dir, "absent.jsonl"));

    expect(await store.query()).toEqual([]);
  });

  it("rejects lines that are not audit records", async () => {
    const file = join(dir, "audit.jsonl");
    await writeFile(file, `${JSON.stringify({ id: "x" })}\n`);

    await expect(new JsonlAuditStore(file).query()).rejects.toThrow(`${file}:1: not an audit record`);
  });
});
