import { CircuitBreaker } from '@/modules/circuitBreaker';

describe('CircuitBreaker (unit)', () => {
  let now: number;
  let breaker: CircuitBreaker;

  beforeEach(() => {
    // Controlled clock makes cooldown behavior deterministic
    now = Date.parse('2025-01-01T10:00:00Z');
    breaker = new CircuitBreaker({ failureThreshold: 3, cooldownMs: 60_000 }, () => now);
  });

  /**
   * Purpose:
   * Verifies Core behavior:
   * - breaker starts in closed state
   * - calls are allowed
   */
  it('allows calls when breaker is closed', () => {
    expect(breaker.canCall()).toBe(true);
  });

  /**
   * Purpose:
   * Verifies Defensive behavior:
   * - failures are tolerated up to the threshold
   * - breaker opens only once the threshold is reached
   */
  it('blocks calls only after failure threshold is reached', () => {
    breaker.recordFailure();
    breaker.recordFailure();

    expect(breaker.canCall()).toBe(true);

    breaker.recordFailure(); // threshold reached
    expect(breaker.canCall()).toBe(false);
    expect(breaker.state().openUntil).toBe(now + 60_000);
  });

  /**
   * Purpose:
   * Verifies Recovery behavior:
   * - calls are blocked during cooldown
   * - calls are allowed once cooldown expires
   */
  it('allows calls again after cooldown expires', () => {
    breaker.recordFailure();
    breaker.recordFailure();
    breaker.recordFailure();

    now += 60_000;
    // Strict boundary: now must exceed openUntil
    expect(breaker.canCall()).toBe(false);

    now += 1;
    expect(breaker.canCall()).toBe(true);
  });

  /**
   * Purpose:
   * Verifies State reset behavior:
   * - successful call clears failure count
   * - breaker is closed immediately
   */
  it('resets breaker state on success', () => {
    breaker.recordFailure();
    breaker.recordFailure();
    breaker.recordFailure();

    expect(breaker.canCall()).toBe(false);

    breaker.recordSuccess();

    expect(breaker.state()).toEqual({ consecutiveFailures: 0, openUntil: 0 });
    expect(breaker.canCall()).toBe(true);
  });

  /**
   * Purpose:
   * Verifies instances are isolated from each other.
   */
  it('keeps failure counts per instance', () => {
    const other = new CircuitBreaker({ failureThreshold: 1, cooldownMs: 1000 }, () => now);

    other.recordFailure();

    expect(other.canCall()).toBe(false);
    expect(breaker.canCall()).toBe(true);
  });
});
