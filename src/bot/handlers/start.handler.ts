import { debugLog } from '../../common/utils/debug-logger';
import { IncomingUpdate } from '../contracts';
import { RelayConfig } from '../relay.config';
import { TelegramApiClient } from '../services/telegram-api.client';
import { HandlerOutcome, IGNORED } from './handler-result';
import { welcomeReply } from './replies';
import { UpdateHandler } from './update-handler.interface';

/**
 * /start: welcome text with the Get Started / Help / Join Channel keyboard.
 */
export class StartHandler implements UpdateHandler {
  readonly name = 'start';
  private readonly log = debugLog.handlers;

  constructor(
    private readonly telegram: TelegramApiClient,
    private readonly cfg: RelayConfig,
  ) {}

  canHandle(update: IncomingUpdate): boolean {
    return update.kind === 'message' && update.command?.name === 'start';
  }

  async handle(update: IncomingUpdate, cid: string): Promise<HandlerOutcome> {
    if (update.kind !== 'message') return IGNORED;

    this.log.command('/start', { chat: update.chatId }, cid);
    await this.telegram.sendMessage({
      chat_id: update.chatId,
      ...welcomeReply(this.cfg),
    });
    return { handled: true, action: 'welcome' };
  }
}
