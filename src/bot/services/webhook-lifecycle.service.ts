import {
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnApplicationShutdown,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllowedUpdate } from '../adapters/telegram.types';
import { BotService } from '../bot.service';
import { TelegramApiClient } from './telegram-api.client';

export const ALLOWED_UPDATES: AllowedUpdate[] = ['message', 'callback_query'];

/**
 * Registers the webhook with Telegram when the app boots and removes it
 * on shutdown, so a stopped instance does not keep receiving updates.
 */
@Injectable()
export class WebhookLifecycleService
  implements OnApplicationBootstrap, OnApplicationShutdown
{
  private readonly log = new Logger(WebhookLifecycleService.name);
  private readonly enabled: boolean;

  constructor(
    private readonly telegram: TelegramApiClient,
    private readonly bot: BotService,
    private readonly cfg: ConfigService,
  ) {
    this.enabled = cfg.get<boolean>('REGISTER_WEBHOOK') !== false;
  }

  async onApplicationBootstrap(): Promise<void> {
    if (!this.enabled) {
      this.log.warn('REGISTER_WEBHOOK=false, assuming the webhook is managed elsewhere');
      this.bot.markReady();
      return;
    }

    const url = this.cfg.getOrThrow<string>('WEBHOOK_URL');
    const secret = this.cfg.get<string>('WEBHOOK_SECRET');
    const dropPending = this.cfg.get<boolean>('DROP_PENDING_UPDATES') !== false;

    await this.telegram.deleteWebhook(dropPending);
    const ok = await this.telegram.setWebhook({
      url,
      allowed_updates: ALLOWED_UPDATES,
      ...(secret ? { secret_token: secret } : {}),
    });

    if (!ok) {
      this.log.warn('setWebhook returned false');
    } else {
      this.log.log(`Webhook set to ${url}`);
    }

    this.bot.markReady();
    this.log.log('Telegram bot ready (webhook mode)');
  }

  async onApplicationShutdown(signal?: string): Promise<void> {
    if (!this.enabled) return;

    this.log.log(`Shutdown${signal ? ` (${signal})` : ''}: deleting webhook`);
    try {
      await this.telegram.deleteWebhook(false);
    } catch (err) {
      this.log.error(
        'Failed to delete webhook during shutdown',
        err instanceof Error ? err.message : String(err),
      );
    }
  }
}
