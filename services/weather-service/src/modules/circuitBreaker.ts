import { Clock, systemClock } from '../utils/time';

export interface CircuitBreakerOptions {
  failureThreshold: number;
  cooldownMs: number;
}

export const DEFAULT_BREAKER_OPTIONS: CircuitBreakerOptions = {
  failureThreshold: 3,
  cooldownMs: 60_000,
};

export class CircuitBreaker {
  private consecutiveFailures = 0;
  private openUntil = 0;

  constructor(
    private readonly options: CircuitBreakerOptions = DEFAULT_BREAKER_OPTIONS,
    private readonly clock: Clock = systemClock
  ) {}

  canCall(): boolean {
    return this.clock() > this.openUntil;
  }

  recordSuccess(): void {
    this.consecutiveFailures = 0;
    this.openUntil = 0;
  }

  recordFailure(): void {
    this.consecutiveFailures++;

    if (this.consecutiveFailures >= this.options.failureThreshold) {
      this.openUntil = this.clock() + this.options.cooldownMs;
    }
  }

  state() {
    return {
      consecutiveFailures: this.consecutiveFailures,
      openUntil: this.openUntil,
    };
  }
}
