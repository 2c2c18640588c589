import { z } from 'zod';
import { logger } from '../logger';
import { CacheEntrySchema } from '../schemas/weather.schema';
import { KeyValueStore } from '../store/keyValueStore';
import { Clock, systemClock } from '../utils/time';

export interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

export function isExpired(entry: CacheEntry<unknown>, now: number): boolean {
  return now >= entry.expiresAt;
}

/**
 * Typed TTL cache over a string store. Expiry is checked lazily on read;
 * backend failures propagate to the caller.
 */
export class TtlCache<T> {
  constructor(
    private readonly store: KeyValueStore,
    private readonly valueSchema: z.ZodType<T>,
    private readonly clock: Clock = systemClock
  ) {}

  async get(key: string): Promise<T | undefined> {
    const raw = await this.store.get(key);
    if (raw === null) return undefined;

    const entry = this.decode(key, raw);
    if (!entry || isExpired(entry, this.clock())) return undefined;

    return entry.value;
  }

  async set(key: string, value: T, ttlMs: number): Promise<void> {
    const entry: CacheEntry<T> = { value, expiresAt: this.clock() + ttlMs };
    await this.store.set(key, JSON.stringify(entry), ttlMs);
  }

  async delete(key: string): Promise<void> {
    await this.store.delete(key);
  }

  private decode(key: string, raw: string): CacheEntry<T> | null {
    try {
      const entry = CacheEntrySchema.safeParse(JSON.parse(raw));
      const value = this.valueSchema.safeParse(entry.success ? entry.data.value : undefined);

      if (entry.success && value.success) {
        return { value: value.data, expiresAt: entry.data.expiresAt };
      }
      logger.warn({ key }, 'Discarding malformed cache entry');
    } catch (err) {
      logger.warn({ key, err }, 'Discarding unparsable cache entry');
    }
    return null;
  }
}
