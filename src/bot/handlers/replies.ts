import { escapeHtml } from '../../common/utils/html';
import { InlineKeyboardMarkup, SendMessageParams } from '../adapters/telegram.types';
import { RelayConfig } from '../relay.config';

export const CALLBACK_GET_STARTED = 'get_started';
export const CALLBACK_HELP = 'help';

type Reply = Omit<SendMessageParams, 'chat_id'>;

export function welcomeReply(cfg: RelayConfig): Reply {
  const keyboard: InlineKeyboardMarkup = {
    inline_keyboard: [
      [{ text: '📚 Get Started', callback_data: CALLBACK_GET_STARTED }],
      [{ text: 'ℹ️ Help', callback_data: CALLBACK_HELP }],
      [{ text: 'Join Channel', url: cfg.publicChannelUrl }],
    ],
  };
  return {
    text: `📚 Welcome!\nJoin: ${cfg.publicChannel}\nSend book ID (e.g. 123)`,
    reply_markup: keyboard,
  };
}

export function guideReply(cfg: RelayConfig): Reply {
  return {
    text: `📖 Send book ID (from ${escapeHtml(cfg.publicChannel)}). Example: <code>123</code>`,
    parse_mode: 'HTML',
  };
}

export function helpReply(cfg: RelayConfig): Reply {
  return {
    text: `ℹ️ Help:\n• Send book ID to download\n• Find IDs in: ${escapeHtml(cfg.publicChannel)}`,
    parse_mode: 'HTML',
  };
}

export function bookSentReply(): Reply {
  return { text: '✅ Book sent!' };
}

export function bookFailedReply(cfg: RelayConfig): Reply {
  return { text: `❌ Error. Check ID at ${cfg.publicChannel}` };
}

export function invalidRequestReply(cfg: RelayConfig): Reply {
  return {
    text: `📚 Send a numeric book ID. Find IDs at ${escapeHtml(cfg.publicChannel)}`,
    parse_mode: 'HTML',
  };
}
