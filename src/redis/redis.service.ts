import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';

const FALLBACK_SWEEP_INTERVAL_MS = 60_000;

/**
 * Redis service with in-memory fallback for single-instance deployments.
 * GUARD: If MULTI_INSTANCE=true and Redis unavailable, operations fail hard.
 */
@Injectable()
export class RedisService implements OnModuleDestroy {
  private readonly logger = new Logger(RedisService.name);
  private client: Redis | null = null;
  private readonly fallbackCache = new Map<
    string,
    { value: string; expiresAt: number }
  >();
  private readonly multiInstance: boolean;
  private connected = false;
  private lastSweepAt = Date.now();

  constructor(private readonly config: ConfigService) {
    this.multiInstance = config.get<boolean>('MULTI_INSTANCE') === true;
    this.initializeClient();
  }

  private initializeClient() {
    const redisUrl = this.config.get<string>('REDIS_URL');

    if (!redisUrl) {
      this.logger.warn('REDIS_URL not configured, using in-memory fallback');
      return;
    }

    try {
      const client = new Redis(redisUrl, {
        maxRetriesPerRequest: 3,
        retryStrategy: (times) => {
          if (times > 3) return null;
          return Math.min(times * 100, 2000);
        },
        lazyConnect: true,
      });

      client.on('connect', () => {
        this.connected = true;
        this.logger.log('Redis connected');
      });

      client.on('error', (err: Error) => {
        this.connected = false;
        this.logger.error('Redis error', err.message);
      });

      client.on('close', () => {
        this.connected = false;
        this.logger.warn('Redis connection closed');
      });

      client.connect().catch((err: Error) => {
        this.logger.error('Failed to connect to Redis', err.message);
      });

      this.client = client;
    } catch (err) {
      this.logger.error('Failed to initialize Redis client', err);
    }
  }

  async onModuleDestroy() {
    if (this.client) {
      await this.client.quit();
    }
  }

  /**
   * Returns the live client, null for fallback mode.
   * Throws in multi-instance mode when Redis is down.
   */
  private liveClient(): Redis | null {
    if (this.connected && this.client) {
      return this.client;
    }
    if (this.multiInstance) {
      throw new Error('Redis unavailable in multi-instance mode');
    }
    return null;
  }

  /**
   * Drops expired fallback entries, at most once per sweep interval.
   * Most keys (update ids) are never read again after they expire.
   */
  private sweepFallback(): void {
    const now = Date.now();
    if (now - this.lastSweepAt < FALLBACK_SWEEP_INTERVAL_MS) return;
    this.lastSweepAt = now;

    for (const [key, entry] of this.fallbackCache) {
      if (entry.expiresAt <= now) {
        this.fallbackCache.delete(key);
      }
    }
  }

  private writeFallback(key: string, value: string, ttlSeconds: number): void {
    this.sweepFallback();
    this.fallbackCache.set(key, {
      value,
      expiresAt: Date.now() + ttlSeconds * 1000,
    });
  }

  private readFallback(key: string): string | null {
    const entry = this.fallbackCache.get(key);
    if (entry && entry.expiresAt > Date.now()) {
      return entry.value;
    }
    this.fallbackCache.delete(key);
    return null;
  }

  /**
   * Get value from Redis or fallback
   */
  async get(key: string): Promise<string | null> {
    const client = this.liveClient();
    if (client) {
      return client.get(key);
    }
    return this.readFallback(key);
  }

  /**
   * Set value with TTL (seconds)
   */
  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    const client = this.liveClient();
    if (client) {
      await client.setex(key, ttlSeconds, value);
      return;
    }

    this.writeFallback(key, value, ttlSeconds);
  }

  /**
   * Set value only when the key is absent.
   * Returns true if this call wrote the key.
   */
  async setIfAbsent(
    key: string,
    value: string,
    ttlSeconds: number,
  ): Promise<boolean> {
    const client = this.liveClient();
    if (client) {
      const result = await client.set(key, value, 'EX', ttlSeconds, 'NX');
      return result === 'OK';
    }

    if (this.readFallback(key) !== null) {
      return false;
    }
    this.writeFallback(key, value, ttlSeconds);
    return true;
  }

  /**
   * Delete key
   */
  async del(key: string): Promise<void> {
    const client = this.liveClient();
    if (client) {
      await client.del(key);
      return;
    }

    this.fallbackCache.delete(key);
  }

  /**
   * Health check
   */
  async isHealthy(): Promise<boolean> {
    if (!this.client || !this.connected) {
      return !this.multiInstance; // Healthy in single-instance fallback mode
    }

    try {
      const result = await this.client.ping();
      return result === 'PONG';
    } catch {
      return !this.multiInstance;
    }
  }

  /**
   * Get connection status
   */
  getStatus(): {
    connected: boolean;
    mode: 'redis' | 'fallback';
    fallbackKeys: number;
  } {
    return {
      connected: this.connected,
      mode: this.connected && this.client ? 'redis' : 'fallback',
      fallbackKeys: this.fallbackCache.size,
    };
  }
}
