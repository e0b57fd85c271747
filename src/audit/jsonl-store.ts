/**
 * Audit Log — JSON Lines Storage
 *
 * One JSON document per line, appended with a single write per record. Reads
 * validate every line against the record schema.
 */

import { appendFile, mkdir, readFile } from "node:fs/promises";
import { dirname } from "node:path";
import { Check } from "@sinclair/typebox/value";
import { selectRecords } from "./query.js";
import { AuditRecordSchema, type AuditQuery, type AuditRecord, type AuditStore } from "./types.js";

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export function parseAuditLines(content: string, source: string): AuditRecord[] {
  const records: AuditRecord[] = [];
  const lines = content.split("\n");
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i]?.trim();
    if (!line) continue;
    let value: unknown;
    try {
      value = JSON.parse(line);
    } catch (error) {
      throw new Error(`${source}:${i + 1}: not valid JSON`, { cause: error });
    }
    if (!Check(AuditRecordSchema, value)) {
      throw new Error(`${source}:${i + 1}: not an audit record`);
    }
    records.push(value);
  }
  return records;
}

export class JsonlAuditStore implements AuditStore {
  private directoryReady = false;

  constructor(readonly filePath: string) {}

  async append(record: AuditRecord): Promise<void> {
    if (!this.directoryReady) {
      await mkdir(dirname(this.filePath), { recursive: true });
      this.directoryReady = true;
    }
    await appendFile(this.filePath, `${JSON.stringify(record)}\n`, "utf8");
  }

  async query(filter?: AuditQuery): Promise<AuditRecord[]> {
    let content: string;
    try {
      content = await readFile(this.filePath, "utf8");
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw error;
    }
    return selectRecords(parseAuditLines(content, this.filePath), filter);
  }

  async close(): Promise<void> {}
}
