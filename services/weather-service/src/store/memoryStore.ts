import { Clock, systemClock } from '../utils/time';
import { KeyValueStore } from './keyValueStore';

interface Slot {
  value: string;
  expiresAt?: number;
}

/**
 * In-process backend for local development and tests.
 */
export class MemoryStore implements KeyValueStore {
  private readonly slots = new Map<string, Slot>();

  constructor(private readonly clock: Clock = systemClock) {}

  async get(key: string): Promise<string | null> {
    const slot = this.slots.get(key);
    if (!slot) return null;

    if (slot.expiresAt !== undefined && this.clock() >= slot.expiresAt) {
      this.slots.delete(key);
      return null;
    }
    return slot.value;
  }

  async set(key: string, value: string, ttlMs?: number): Promise<void> {
    this.slots.set(key, {
      value,
      expiresAt: ttlMs === undefined ? undefined : this.clock() + ttlMs,
    });
  }

  async delete(key: string): Promise<void> {
    this.slots.delete(key);
  }

  async close(): Promise<void> {
    this.slots.clear();
  }
}
