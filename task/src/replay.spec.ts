import { describe, expect, it } from 'vitest';
import { ReplayGuard } from './replay.js';

describe('ReplayGuard', () => {
  it('accepts a request id once', () => {
    const guard = new ReplayGuard();

    expect(guard.claim('req-1', 2_000, 1_000)).toBe(true);
    expect(guard.claim('req-1', 2_000, 1_500)).toBe(false);
    expect(guard.claim('req-2', 2_000, 1_500)).toBe(true);
  });

  it('still holds an id at the last instant of its window', () => {
    const guard = new ReplayGuard();
    guard.claim('req-1', 2_000, 1_000);

    expect(guard.claim('req-1', 2_000, 2_000)).toBe(false);
    expect(guard.size).toBe(1);
  });

  it('forgets ids once their window has closed', () => {
    const guard = new ReplayGuard();
    guard.claim('req-1', 2_000, 1_000);

    expect(guard.claim('req-1', 4_000, 2_001)).toBe(true);
    expect(guard.size).toBe(1);
  });
});
