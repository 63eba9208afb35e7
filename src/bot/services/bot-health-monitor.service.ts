import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TelegramApiClient } from './telegram-api.client';

/**
 * Periodically calls getMe so a revoked token or an unreachable Bot API
 * shows up in the logs before users notice.
 */
@Injectable()
export class BotHealthMonitorService implements OnModuleInit, OnModuleDestroy {
  private readonly log = new Logger(BotHealthMonitorService.name);
  private readonly intervalMs: number;
  private timer: NodeJS.Timeout | null = null;
  private lastHealthyAt: number | null = null;

  constructor(
    private readonly telegram: TelegramApiClient,
    cfg: ConfigService,
  ) {
    this.intervalMs = cfg.get<number>('HEALTH_CHECK_INTERVAL_MS') ?? 300_000;
  }

  onModuleInit(): void {
    this.timer = setInterval(() => {
      void this.check();
    }, this.intervalMs);
    this.timer.unref();
  }

  onModuleDestroy(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /**
   * Never throws; resolves to whether getMe succeeded.
   */
  async check(): Promise<boolean> {
    try {
      const me = await this.telegram.getMe();
      this.lastHealthyAt = Date.now();
      this.log.log(`Bot is healthy: @${me.username ?? me.first_name}`);
      return true;
    } catch (err) {
      this.log.error(
        `Bot health check failed: ${err instanceof Error ? err.message : String(err)}`,
      );
      return false;
    }
  }

  getLastHealthyAt(): number | null {
    return this.lastHealthyAt;
  }
}
