/**
 * Audit Log
 *
 * Wraps a store so that recording never throws: a failed write comes back as
 * a LogError and is logged as a warning. An apply that already happened is
 * never undone because its audit record could not be kept.
 */

import { randomUUID } from "node:crypto";
import { formatErrorMessage } from "../aws-errors.js";
import type { Logger } from "../logger.js";
import { err, ok, type LogError, type Result } from "../types.js";
import type { AuditEntry, AuditQuery, AuditRecord, AuditStore } from "./types.js";

export type AuditLogOptions = {
  /** Record id generator */
  newId?: () => string;
};

export class AuditLog {
  private readonly newId: () => string;

  constructor(
    private readonly store: AuditStore,
    private readonly logger: Logger,
    options: AuditLogOptions = {},
  ) {
    this.newId = options.newId ?? randomUUID;
  }

  async record(entry: AuditEntry): Promise<Result<AuditRecord, LogError>> {
    const record: AuditRecord = { id: this.newId(), ...entry };
    try {
      await this.store.append(record);
      this.logger.debug("Audit record written", { id: record.id, target: record.targetKey, status: record.status });
      return ok(record);
    } catch (error) {
      const message = formatErrorMessage(error);
      this.logger.warn("Audit record could not be written", { target: record.targetKey, error: message });
      return err({ kind: "LogError", message });
    }
  }

  query(filter?: AuditQuery): Promise<AuditRecord[]> {
    return this.store.query(filter);
  }

  close(): Promise<void> {
    return this.store.close();
  }
}
