/**
 * Redis key patterns used by the relay bot.
 */
export const RedisKeys = {
  // Webhook redelivery guard, one key per Telegram update_id
  updateDedup: (updateId: number) => `upd:${updateId}`,
};

/**
 * TTL constants in seconds
 */
export const RedisTTL = {
  UPDATE_PROCESSING: 120, // 2 minutes (short TTL for crash recovery)
  UPDATE_DONE: 24 * 3600, // 24 hours, Telegram stops redelivering long before
};
