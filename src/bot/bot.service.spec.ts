import { ConfigService } from '@nestjs/config';
import { RedisService } from '../redis';
import {
  callbackUpdate,
  createTelegramClient,
  messageUpdate,
  relayConfig,
  stubTelegram,
} from '../testing/telegram.fixtures';
import { BotService } from './bot.service';
import { HandlerRegistry } from './handlers/handler-registry';
import { UpdateDedupService } from './services/update-dedup.service';

describe('BotService', () => {
  const setup = () => {
    const client = createTelegramClient();
    const tg = stubTelegram(client);
    const dedup = new UpdateDedupService(new RedisService(new ConfigService({})));
    const bot = new BotService(new HandlerRegistry(client, relayConfig), dedup);
    return { tg, bot };
  };

  it('starts out not ready', () => {
    const { bot } = setup();

    expect(bot.isReady()).toBe(false);
    bot.markReady();
    expect(bot.isReady()).toBe(true);
  });

  it('runs the matching handler', async () => {
    const { tg, bot } = setup();

    await expect(bot.handle(messageUpdate('12', 100))).resolves.toEqual({
      handled: true,
      action: 'book_sent',
    });
    expect(tg.forwardMessage).toHaveBeenCalledTimes(1);
  });

  it('ignores a redelivered update', async () => {
    const { tg, bot } = setup();

    await bot.handle(callbackUpdate('help', 101));
    const second = await bot.handle(callbackUpdate('help', 101));

    expect(second).toEqual({ handled: false, action: 'ignored' });
    expect(tg.answerCallbackQuery).toHaveBeenCalledTimes(1);
  });

  it('ignores updates no handler accepts', async () => {
    const { tg, bot } = setup();

    await expect(bot.handle(messageUpdate('/settings', 102))).resolves.toEqual({
      handled: false,
      action: 'ignored',
    });
    expect(tg.sendMessage).not.toHaveBeenCalled();
  });

  it('lets a failed update be processed again', async () => {
    const { tg, bot } = setup();
    tg.sendMessage.mockRejectedValueOnce(new Error('network down'));

    await expect(bot.handle(messageUpdate('/start', 103))).rejects.toThrow('network down');
    await expect(bot.handle(messageUpdate('/start', 103))).resolves.toEqual({
      handled: true,
      action: 'welcome',
    });
    expect(tg.sendMessage).toHaveBeenCalledTimes(2);
  });
});
