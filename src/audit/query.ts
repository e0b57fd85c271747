import { DEFAULT_QUERY_LIMIT, type AuditQuery, type AuditRecord } from "./types.js";

/**
 * Filter records held in insertion order and return them newest first. Records
 * sharing a timestamp come back in reverse insertion order.
 */
export function selectRecords(records: readonly AuditRecord[], filter: AuditQuery = {}): AuditRecord[] {
  let results = [...records].reverse();

  if (filter.targetKey) {
    results = results.filter((r) => r.targetKey === filter.targetKey);
  }
  if (filter.status) {
    results = results.filter((r) => r.status === filter.status);
  }
  const since = filter.since;
  if (since) {
    results = results.filter((r) => r.timestamp >= since);
  }

  results.sort((a, b) => b.timestamp.localeCompare(a.timestamp));
  return results.slice(0, filter.limit ?? DEFAULT_QUERY_LIMIT);
}
