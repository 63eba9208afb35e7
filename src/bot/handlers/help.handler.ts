import { debugLog } from '../../common/utils/debug-logger';
import { IncomingUpdate } from '../contracts';
import { RelayConfig } from '../relay.config';
import { TelegramApiClient } from '../services/telegram-api.client';
import { HandlerOutcome, IGNORED } from './handler-result';
import { helpReply } from './replies';
import { UpdateHandler } from './update-handler.interface';

export class HelpHandler implements UpdateHandler {
  readonly name = 'help';
  private readonly log = debugLog.handlers;

  constructor(
    private readonly telegram: TelegramApiClient,
    private readonly cfg: RelayConfig,
  ) {}

  canHandle(update: IncomingUpdate): boolean {
    return update.kind === 'message' && update.command?.name === 'help';
  }

  async handle(update: IncomingUpdate, cid: string): Promise<HandlerOutcome> {
    if (update.kind !== 'message') return IGNORED;

    this.log.command('/help', { chat: update.chatId }, cid);
    await this.telegram.sendMessage({
      chat_id: update.chatId,
      ...helpReply(this.cfg),
    });
    return { handled: true, action: 'help' };
  }
}
