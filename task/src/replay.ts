/**
 * Remembers request ids until their signature window closes, so a signed
 * request is accepted at most once.
 */
export class ReplayGuard {
  private readonly seen = new Map<string, number>();

  /** Returns false when the id is already held and has not expired. */
  claim(requestId: string, expiresAt: number, now: number): boolean {
    this.prune(now);
    if (this.seen.has(requestId)) {
      return false;
    }
    this.seen.set(requestId, expiresAt);
    return true;
  }

  get size(): number {
    return this.seen.size;
  }

  private prune(now: number): void {
    for (const [requestId, expiresAt] of this.seen) {
      if (expiresAt < now) {
        this.seen.delete(requestId);
      }
    }
  }
}
