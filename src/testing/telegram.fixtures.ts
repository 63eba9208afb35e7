import axios, {
  AxiosAdapter,
  AxiosInstance,
  AxiosResponse,
  InternalAxiosRequestConfig,
} from 'axios';
import { parseCommand } from '../bot/adapters/telegram.adapter';
import { TelegramMessage } from '../bot/adapters/telegram.types';
import { CallbackUpdate, MessageUpdate } from '../bot/contracts';
import { RelayConfig } from '../bot/relay.config';
import { TelegramApiClient } from '../bot/services/telegram-api.client';

export const TEST_TOKEN = 'test-token';
export const CHAT_ID = 42;
export const PRIVATE_CHANNEL_ID = -1001234567890;

export const relayConfig: RelayConfig = {
  privateChannelId: PRIVATE_CHANNEL_ID,
  publicChannel: 'https://t.me/example_books',
  publicChannelUrl: 'https://t.me/example_books',
};

export type FakeReply = (config: InternalAxiosRequestConfig) => AxiosResponse;

export function okReply(result: unknown): FakeReply {
  return (config) => ({
    data: { ok: true, result },
    status: 200,
    statusText: 'OK',
    headers: {},
    config,
  });
}

export function errorReply(
  status: number,
  description: string,
  parameters?: { retry_after?: number },
): FakeReply {
  return (config) => ({
    data: { ok: false, error_code: status, description, parameters },
    status,
    statusText: '',
    headers: {},
    config,
  });
}

/**
 * An axios instance whose adapter answers from a queue of replies and
 * records every request it receives.
 */
export function createFakeHttp(...replies: FakeReply[]): {
  http: AxiosInstance;
  requests: InternalAxiosRequestConfig[];
} {
  const requests: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async (config) => {
    requests.push(config);
    const next = replies.shift();
    if (!next) throw new Error(`Unexpected Bot API request to ${config.url ?? ''}`);
    return next(config);
  };
  return {
    http: axios.create({ baseURL: 'https://api.telegram.test', adapter }),
    requests,
  };
}

/** Client whose methods are meant to be replaced with jest.spyOn. */
export function createTelegramClient(): TelegramApiClient {
  const { http } = createFakeHttp();
  return new TelegramApiClient(http, {
    token: TEST_TOKEN,
    maxAttempts: 1,
    retryBaseMs: 0,
  });
}

export function sentMessage(messageId = 100, chatId = CHAT_ID): TelegramMessage {
  return { message_id: messageId, date: 0, chat: { id: chatId, type: 'private' } };
}

export function stubTelegram(client: TelegramApiClient) {
  return {
    sendMessage: jest.spyOn(client, 'sendMessage').mockResolvedValue(sentMessage()),
    forwardMessage: jest.spyOn(client, 'forwardMessage').mockResolvedValue(500),
    answerCallbackQuery: jest.spyOn(client, 'answerCallbackQuery').mockResolvedValue(true),
    editMessageText: jest.spyOn(client, 'editMessageText').mockResolvedValue(true),
  };
}

export function messageUpdate(text: string, updateId = 1): MessageUpdate {
  return {
    kind: 'message',
    updateId,
    chatId: CHAT_ID,
    messageId: 10,
    text,
    command: parseCommand(text),
    from: { id: CHAT_ID, username: 'reader', firstName: 'Ann' },
  };
}

export function callbackUpdate(data: string, updateId = 2): CallbackUpdate {
  return {
    kind: 'callback',
    updateId,
    callbackId: 'cb-1',
    chatId: CHAT_ID,
    messageId: 55,
    data,
  };
}
