import { Injectable } from '@nestjs/common';
import { RedisService } from './redis.service';

export interface RedisHealth {
  status: 'up' | 'down';
  mode: 'redis' | 'fallback';
}

/**
 * Reports store status for the health endpoint.
 */
@Injectable()
export class RedisHealthIndicator {
  constructor(private readonly redis: RedisService) {}

  async check(): Promise<{ redis: RedisHealth }> {
    const isHealthy = await this.redis.isHealthy();
    const { mode } = this.redis.getStatus();

    return {
      redis: {
        status: isHealthy ? 'up' : 'down',
        mode,
      },
    };
  }
}
