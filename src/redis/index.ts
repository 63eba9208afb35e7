export { RedisService } from './redis.service';
export { RedisModule } from './redis.module';
export { RedisHealthIndicator } from './redis.health';
export { RedisKeys, RedisTTL } from './keys';
