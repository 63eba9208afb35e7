import { ConfigModule } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { CommonModule } from '../common/common.module';
import { RedisModule } from '../redis';
import {
  CHAT_ID,
  createFakeHttp,
  okReply,
  sentMessage,
} from '../testing/telegram.fixtures';
import { BotController } from './bot.controller';
import { BotModule } from './bot.module';
import { TELEGRAM_HTTP } from './services/telegram-api.client';

const env = {
  BOT_TOKEN: 'test-token',
  PRIVATE_CHANNEL_ID: '-1001234567890',
  PUBLIC_CHANNEL: '@example_books',
  WEBHOOK_URL: 'https://relay.example.com/webhook',
};

describe('BotModule', () => {
  it('registers the webhook, relays a book and unregisters on close', async () => {
    const { http, requests } = createFakeHttp(
      okReply(true), // deleteWebhook
      okReply(true), // setWebhook
      okReply(sentMessage(900)), // forwardMessage
      okReply(sentMessage(901)), // sendMessage
      okReply(true), // deleteWebhook on shutdown
    );

    const moduleRef = await Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({ isGlobal: true, ignoreEnvFile: true, load: [() => env] }),
        RedisModule,
        CommonModule,
        BotModule,
      ],
    })
      .overrideProvider(TELEGRAM_HTTP)
      .useValue(http)
      .compile();

    await moduleRef.init();
    const controller = moduleRef.get(BotController);

    const update = {
      update_id: 7001,
      message: {
        message_id: 3,
        date: 0,
        chat: { id: CHAT_ID, type: 'private' },
        text: ' 123 ',
      },
    };
    await expect(controller.telegram(update, 'application/json')).resolves.toEqual({ ok: true });

    await moduleRef.close();

    expect(requests.map((r) => r.url)).toEqual([
      '/bottest-token/deleteWebhook',
      '/bottest-token/setWebhook',
      '/bottest-token/forwardMessage',
      '/bottest-token/sendMessage',
      '/bottest-token/deleteWebhook',
    ]);
    expect(requests.map((r) => JSON.parse(String(r.data)))).toEqual([
      { drop_pending_updates: true },
      {
        url: 'https://relay.example.com/webhook',
        allowed_updates: ['message', 'callback_query'],
      },
      { chat_id: CHAT_ID, from_chat_id: -1001234567890, message_id: 123 },
      { chat_id: CHAT_ID, text: '✅ Book sent!' },
      { drop_pending_updates: false },
    ]);
  });
});
