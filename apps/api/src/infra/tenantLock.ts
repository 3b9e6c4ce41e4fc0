// ────────────────────────────────────────────
// Per-tenant exclusive lock
//
// A second caller while the tenant is busy is
// coalesced: it gets `{ acquired: false }` and
// never waits in a queue.
// ────────────────────────────────────────────

export type LockOutcome<T> = { acquired: true; value: T } | { acquired: false };

export class TenantLock {
  private readonly running = new Set<string>();

  isLocked(tenantId: string): boolean {
    return this.running.has(tenantId);
  }

  async runExclusive<T>(tenantId: string, fn: () => Promise<T>): Promise<LockOutcome<T>> {
    if (this.running.has(tenantId)) return { acquired: false };
    this.running.add(tenantId);
    try {
      return { acquired: true, value: await fn() };
    } finally {
      this.running.delete(tenantId);
    }
  }
}
