import { debugLog } from '../../common/utils/debug-logger';
import { IncomingUpdate } from '../contracts';
import { RelayConfig } from '../relay.config';
import { TelegramApiClient, TelegramApiError } from '../services/telegram-api.client';
import { HandlerOutcome, IGNORED } from './handler-result';
import { CALLBACK_GET_STARTED, guideReply, helpReply } from './replies';
import { UpdateHandler } from './update-handler.interface';

/**
 * Inline keyboard presses. The query is always answered first so the
 * client stops its loading spinner, then the keyboard message is edited
 * in place.
 */
export class CallbackHandler implements UpdateHandler {
  readonly name = 'callback';
  private readonly log = debugLog.handlers;

  constructor(
    private readonly telegram: TelegramApiClient,
    private readonly cfg: RelayConfig,
  ) {}

  canHandle(update: IncomingUpdate): boolean {
    return update.kind === 'callback';
  }

  async handle(update: IncomingUpdate, cid: string): Promise<HandlerOutcome> {
    if (update.kind !== 'callback') return IGNORED;

    this.log.command('Button pressed', { data: update.data, chat: update.chatId }, cid);
    await this.telegram.answerCallbackQuery({ callback_query_id: update.callbackId });

    const isGuide = update.data === CALLBACK_GET_STARTED;
    const reply = isGuide ? guideReply(this.cfg) : helpReply(this.cfg);

    try {
      await this.telegram.editMessageText({
        chat_id: update.chatId,
        message_id: update.messageId,
        ...reply,
      });
    } catch (err) {
      // Pressing the same button twice asks for an identical edit
      if (err instanceof TelegramApiError && /message is not modified/i.test(err.description)) {
        this.log.skip('Message already shows this text', undefined, cid);
      } else {
        throw err;
      }
    }

    return { handled: true, action: isGuide ? 'guide' : 'help' };
  }
}
