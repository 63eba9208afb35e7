import { Controller, Get } from '@nestjs/common';
import { BotHealthMonitorService } from './bot/services/bot-health-monitor.service';
import { RedisHealth, RedisHealthIndicator } from './redis/redis.health';

const nowSeconds = () => Date.now() / 1000;

@Controller()
export class AppController {
  constructor(
    private readonly redisHealth: RedisHealthIndicator,
    private readonly botHealth: BotHealthMonitorService,
  ) {}

  @Get()
  async health(): Promise<{
    status: 'ok';
    message: string;
    timestamp: number;
    redis: RedisHealth;
    telegram: { lastHealthyAt: number | null };
  }> {
    const { redis } = await this.redisHealth.check();
    return {
      status: 'ok',
      message: 'Bot is running!',
      timestamp: nowSeconds(),
      redis,
      telegram: { lastHealthyAt: this.botHealth.getLastHealthyAt() },
    };
  }

  @Get('ping')
  ping(): { status: 'pong'; timestamp: number } {
    return { status: 'pong', timestamp: nowSeconds() };
  }
}
