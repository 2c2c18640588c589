import { StoreUnavailableError } from '../errors';
import { DateKey, ForecastRange } from '../interfaces/weather';
import { logger } from '../logger';
import { ForecastRangeSchema } from '../schemas/weather.schema';
import { toIsoDate } from '../utils/input';
import { KeyValueStore } from './keyValueStore';

export function overrideKey(city: string, date: DateKey): string {
  return `override:${city}:${toIsoDate(date)}`;
}

/**
 * User-submitted forecast ranges keyed by (city, date). No TTL;
 * last write wins.
 */
export class OverrideStore {
  constructor(private readonly store: KeyValueStore) {}

  async get(city: string, date: DateKey): Promise<ForecastRange | undefined> {
    const key = overrideKey(city, date);
    const raw = await this.store.get(key);
    if (raw === null) return undefined;

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      logger.error({ key, err }, 'Override entry is not valid JSON');
      throw new StoreUnavailableError('override.get', 'Corrupt override entry');
    }

    // A corrupt override must not read as "no override"
    const parsed = ForecastRangeSchema.safeParse(json);
    if (!parsed.success) {
      logger.error({ key, issues: parsed.error.issues }, 'Override entry failed validation');
      throw new StoreUnavailableError('override.get', 'Corrupt override entry');
    }
    return parsed.data;
  }

  async put(city: string, date: DateKey, range: ForecastRange): Promise<void> {
    await this.store.set(overrideKey(city, date), JSON.stringify(range));
  }
}
