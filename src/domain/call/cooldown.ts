interface CooldownOptions {
  windowMs: number;
  /**
   * How often (in the caller's clock) to drop entries whose window has
   * already elapsed. 0 keeps every entry for the life of the table.
   */
  pruneIntervalMs?: number;
}

/**
 * Per-call sliding cooldown. Each identifier may trigger at most once per
 * window; identifiers never affect each other.
 *
 * Owned by a single pipeline task, so check-and-record needs no locking.
 */
export class CooldownTable {
  private readonly lastTriggered = new Map<string, number>();
  private readonly windowMs: number;
  private readonly pruneIntervalMs: number;
  private lastPruneAt: number | undefined;

  constructor(options: CooldownOptions) {
    this.windowMs = options.windowMs;
    this.pruneIntervalMs = options.pruneIntervalMs ?? 0;
  }

  /**
   * Returns true and records `now` when the identifier is new or its window
   * has elapsed. Returns false and leaves the table alone otherwise.
   */
  shouldTrigger(callId: string, now: number): boolean {
    this.maybePrune(now);

    const last = this.lastTriggered.get(callId);
    if (last !== undefined && now - last < this.windowMs) {
      return false;
    }

    this.lastTriggered.set(callId, now);
    return true;
  }

  lastTriggeredAt(callId: string): number | undefined {
    return this.lastTriggered.get(callId);
  }

  /**
   * Remove entries that would trigger again anyway. Returns how many went.
   */
  prune(now: number): number {
    let removed = 0;
    for (const [callId, last] of this.lastTriggered) {
      if (now - last >= this.windowMs) {
        this.lastTriggered.delete(callId);
        removed++;
      }
    }
    this.lastPruneAt = now;
    return removed;
  }

  get size(): number {
    return this.lastTriggered.size;
  }

  private maybePrune(now: number): void {
    if (this.pruneIntervalMs <= 0) return;

    if (this.lastPruneAt === undefined) {
      this.lastPruneAt = now;
      return;
    }

    if (now - this.lastPruneAt >= this.pruneIntervalMs) {
      this.prune(now);
    }
  }
}
