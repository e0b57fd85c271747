/**
 * At most one reconciliation per target within a process.
 */
export class ReconciliationLock {
  private readonly held = new Set<string>();

  /** False when the key is already held */
  tryAcquire(key: string): boolean {
    if (this.held.has(key)) return false;
    this.held.add(key);
    return true;
  }

  release(key: string): void {
    this.held.delete(key);
  }

  isHeld(key: string): boolean {
    return this.held.has(key);
  }
}
