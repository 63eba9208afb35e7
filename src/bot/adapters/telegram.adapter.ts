import { Injectable, Logger } from '@nestjs/common';
import { BotCommand, IncomingUpdate } from '../contracts';

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asInt(value: unknown): number | null {
  return typeof value === 'number' && Number.isSafeInteger(value) ? value : null;
}

function asString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/**
 * Splits "/get@MyBot 12 34" into { name: 'get', args: '12 34' }.
 */
export function parseCommand(text: string): BotCommand | null {
  const match = /^\/([A-Za-z0-9_]+)(?:@[A-Za-z0-9_]+)?(?:\s+([\s\S]*))?$/.exec(text);
  if (!match) return null;
  return { name: match[1].toLowerCase(), args: (match[2] ?? '').trim() };
}

/**
 * Maps raw webhook payloads onto the bot's IncomingUpdate shape.
 */
@Injectable()
export class TelegramAdapter {
  private readonly log = new Logger(TelegramAdapter.name);

  isUpdateBody(body: unknown): body is JsonObject {
    return isObject(body);
  }

  fromIncoming(body: unknown): IncomingUpdate | null {
    if (!isObject(body)) return null;

    const updateId = asInt(body.update_id);
    if (updateId === null) {
      this.log.debug('Telegram update without update_id');
      return null;
    }

    if (isObject(body.message)) {
      return this.fromMessage(updateId, body.message);
    }

    if (isObject(body.callback_query)) {
      return this.fromCallback(updateId, body.callback_query);
    }

    this.log.debug(`Telegram update ${updateId} has no supported payload`);
    return null;
  }

  private fromMessage(updateId: number, msg: JsonObject): IncomingUpdate | null {
    const chatId = isObject(msg.chat) ? asInt(msg.chat.id) : null;
    const messageId = asInt(msg.message_id);
    const rawText = asString(msg.text);

    if (chatId === null || messageId === null || rawText === undefined) {
      this.log.debug(`Telegram update ${updateId} without processable text`);
      return null;
    }

    const text = rawText.trim();
    const from = isObject(msg.from) ? msg.from : null;
    const fromId = from ? asInt(from.id) : null;

    return {
      kind: 'message',
      updateId,
      chatId,
      messageId,
      text,
      command: parseCommand(text),
      from:
        from && fromId !== null
          ? {
              id: fromId,
              username: asString(from.username),
              firstName: asString(from.first_name),
            }
          : null,
    };
  }

  private fromCallback(updateId: number, query: JsonObject): IncomingUpdate | null {
    const callbackId = asString(query.id);
    const msg = isObject(query.message) ? query.message : null;
    const chatId = msg && isObject(msg.chat) ? asInt(msg.chat.id) : null;
    const messageId = msg ? asInt(msg.message_id) : null;

    if (!callbackId || chatId === null || messageId === null) {
      this.log.debug(`Callback in update ${updateId} without an editable message`);
      return null;
    }

    return {
      kind: 'callback',
      updateId,
      callbackId,
      chatId,
      messageId,
      data: asString(query.data) ?? '',
    };
  }
}
