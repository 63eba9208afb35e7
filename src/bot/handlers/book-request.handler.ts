import { debugLog } from '../../common/utils/debug-logger';
import { IncomingUpdate } from '../contracts';
import { RelayConfig } from '../relay.config';
import { TelegramApiClient, TelegramApiError } from '../services/telegram-api.client';
import { parseBookRequest } from './book-request.parser';
import { HandlerOutcome, IGNORED } from './handler-result';
import { bookFailedReply, bookSentReply, invalidRequestReply } from './replies';
import { UpdateHandler } from './update-handler.interface';

/**
 * Plain text that is not a command: a book ID to relay from the
 * private channel, or anything else, which gets a usage hint.
 */
export class BookRequestHandler implements UpdateHandler {
  readonly name = 'book_request';
  private readonly log = debugLog.handlers;

  constructor(
    private readonly telegram: TelegramApiClient,
    private readonly cfg: RelayConfig,
  ) {}

  canHandle(update: IncomingUpdate): boolean {
    return update.kind === 'message' && update.command === null;
  }

  async handle(update: IncomingUpdate, cid: string): Promise<HandlerOutcome> {
    if (update.kind !== 'message') return IGNORED;

    const request = parseBookRequest(update.text);
    if (!request) {
      this.log.skip('Not a book ID', { text: update.text }, cid);
      await this.telegram.sendMessage({
        chat_id: update.chatId,
        ...invalidRequestReply(this.cfg),
      });
      return { handled: true, action: 'invalid_request' };
    }

    try {
      const forwardedId = await this.telegram.forwardMessage({
        chat_id: update.chatId,
        from_chat_id: this.cfg.privateChannelId,
        message_id: request.messageId,
      });
      this.log.forward('Book forwarded', { book: request.messageId, chat: update.chatId, forwardedId }, cid);
    } catch (err) {
      if (!(err instanceof TelegramApiError)) throw err;

      this.log.err('Forward failed', { book: request.messageId, error: err.description }, cid);
      await this.telegram.sendMessage({
        chat_id: update.chatId,
        ...bookFailedReply(this.cfg),
      });
      return { handled: true, action: 'book_failed', error: err.description };
    }

    // The file is already delivered; a lost confirmation must not trigger a redelivery
    try {
      await this.telegram.sendMessage({ chat_id: update.chatId, ...bookSentReply() });
    } catch (err) {
      this.log.warn('Confirmation not sent', { error: String(err) }, cid);
    }

    return { handled: true, action: 'book_sent' };
  }
}
