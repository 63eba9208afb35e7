import { Injectable } from '@nestjs/common';
import { RedisKeys, RedisService, RedisTTL } from '../../redis';

export type DedupState = 'new' | 'processing' | 'done';

/**
 * Two-phase guard against Telegram webhook redelivery.
 *
 * begin() claims an update with a short "processing" TTL, so a crash
 * mid-update frees it for the next delivery; complete() pins it as
 * "done" for a day; abandon() releases it after a failure so the
 * redelivery is processed.
 */
@Injectable()
export class UpdateDedupService {
  constructor(private readonly redis: RedisService) {}

  async begin(updateId: number): Promise<DedupState> {
    const key = RedisKeys.updateDedup(updateId);

    if (await this.redis.setIfAbsent(key, 'processing', RedisTTL.UPDATE_PROCESSING)) {
      return 'new';
    }

    const state = await this.redis.get(key);
    if (state === 'done') return 'done';
    if (state === 'processing') return 'processing';

    // Expired between the two calls
    const claimed = await this.redis.setIfAbsent(
      key,
      'processing',
      RedisTTL.UPDATE_PROCESSING,
    );
    return claimed ? 'new' : 'processing';
  }

  async complete(updateId: number): Promise<void> {
    await this.redis.set(
      RedisKeys.updateDedup(updateId),
      'done',
      RedisTTL.UPDATE_DONE,
    );
  }

  async abandon(updateId: number): Promise<void> {
    await this.redis.del(RedisKeys.updateDedup(updateId));
  }
}
