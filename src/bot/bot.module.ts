import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios, { AxiosInstance } from 'axios';
import { Agent } from 'https';
import { TelegramAdapter } from './adapters/telegram.adapter';
import { BotController } from './bot.controller';
import { BotService } from './bot.service';
import { WebhookSecretGuard } from './guards/webhook-secret.guard';
import { HandlerRegistry } from './handlers/handler-registry';
import { RELAY_CONFIG, relayConfigFrom } from './relay.config';
import { BotHealthMonitorService } from './services/bot-health-monitor.service';
import { TELEGRAM_HTTP, TelegramApiClient } from './services/telegram-api.client';
import { UpdateDedupService } from './services/update-dedup.service';
import { WebhookLifecycleService } from './services/webhook-lifecycle.service';

// Force IPv4 to avoid timeout issues in Docker
const httpsAgent = new Agent({ family: 4, keepAlive: true });

@Module({
  controllers: [BotController],
  providers: [
    {
      provide: RELAY_CONFIG,
      useFactory: relayConfigFrom,
      inject: [ConfigService],
    },
    {
      provide: TELEGRAM_HTTP,
      useFactory: (cfg: ConfigService): AxiosInstance =>
        axios.create({
          baseURL: cfg.get<string>('TELEGRAM_API_URL') ?? 'https://api.telegram.org',
          timeout: cfg.get<number>('TELEGRAM_TIMEOUT_MS') ?? 15_000,
          httpsAgent,
        }),
      inject: [ConfigService],
    },
    {
      provide: TelegramApiClient,
      useFactory: (http: AxiosInstance, cfg: ConfigService) =>
        new TelegramApiClient(http, {
          token: cfg.getOrThrow<string>('BOT_TOKEN'),
          maxAttempts: cfg.get<number>('TELEGRAM_MAX_ATTEMPTS') ?? 3,
          retryBaseMs: cfg.get<number>('TELEGRAM_RETRY_BASE_MS') ?? 500,
        }),
      inject: [TELEGRAM_HTTP, ConfigService],
    },
    TelegramAdapter,
    UpdateDedupService,
    HandlerRegistry,
    BotService,
    WebhookSecretGuard,
    WebhookLifecycleService,
    BotHealthMonitorService,
  ],
  exports: [TelegramApiClient, BotService, BotHealthMonitorService],
})
export class BotModule {}
