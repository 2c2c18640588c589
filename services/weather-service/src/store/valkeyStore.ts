import IORedis, { Redis, RedisOptions } from "ioredis";
import { StoreUnavailableError } from "../errors";
import { logger } from "../logger";
import { KeyValueStore } from "./keyValueStore";

export interface ValkeyConfig {
  host: string;
  port: number;
  password?: string;
  commandTimeoutMs: number;
}

/**
 * Valkey (Redis protocol) backend. Every failure, including commands issued
 * while disconnected, surfaces as StoreUnavailableError.
 */
export class ValkeyStore implements KeyValueStore {
  readonly redis: Redis;

  private isShuttingDown = false;
  private isAvailable = false;

  constructor(config: ValkeyConfig) {
    const redisOpts: RedisOptions = {
      host: config.host,
      port: config.port,
      password: config.password,
      commandTimeout: config.commandTimeoutMs,
      retryStrategy: () => (this.isShuttingDown ? null : 5000),
      maxRetriesPerRequest: null,
      enableReadyCheck: true,
      lazyConnect: false,
    };

    this.redis = new IORedis(redisOpts);

    // -------------------------
    // Connection state tracking
    // -------------------------
    this.redis.on("ready", () => {
      if (!this.isAvailable) {
        this.isAvailable = true;
        logger.info("Valkey connected");
      }
    });

    this.redis.on("error", (err: Error) => {
      if (this.isAvailable) {
        this.isAvailable = false;
        logger.warn({ err: err.message }, "Valkey unavailable");
      }
    });

    this.redis.on("close", () => {
      if (this.isAvailable) {
        this.isAvailable = false;
        logger.warn("Valkey connection closed");
      }
    });
  }

  available(): boolean {
    return this.isAvailable;
  }

  async get(key: string): Promise<string | null> {
    return this.run("get", () => this.redis.get(key));
  }

  async set(key: string, value: string, ttlMs?: number): Promise<void> {
    await this.run("set", () =>
      ttlMs === undefined
        ? this.redis.set(key, value)
        : this.redis.set(key, value, "PX", ttlMs)
    );
  }

  async delete(key: string): Promise<void> {
    await this.run("delete", () => this.redis.del(key));
  }

  async close(): Promise<void> {
    this.isShuttingDown = true;
    this.isAvailable = false;
    this.redis.disconnect(); // force close, no QUIT round trip
  }

  private async run<T>(operation: string, command: () => Promise<T>): Promise<T> {
    if (!this.isAvailable) {
      throw new StoreUnavailableError(operation);
    }

    try {
      return await command();
    } catch (err) {
      logger.error({ err, operation }, "Valkey command failed");
      throw new StoreUnavailableError(
        operation,
        err instanceof Error ? err.message : undefined
      );
    }
  }
}
