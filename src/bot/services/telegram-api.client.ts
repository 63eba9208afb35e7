import { Logger } from '@nestjs/common';
import axios, { AxiosInstance } from 'axios';
import { debugLog } from '../../common/utils/debug-logger';
import { withRetry } from '../../common/utils/resilience';
import {
  AnswerCallbackQueryParams,
  EditMessageTextParams,
  ForwardMessageParams,
  SendMessageParams,
  SetWebhookParams,
  TelegramMessage,
  TelegramResponse,
  TelegramUser,
  WebhookInfo,
} from '../adapters/telegram.types';

export const TELEGRAM_HTTP = 'TELEGRAM_HTTP';

export interface TelegramClientOptions {
  token: string;
  maxAttempts: number;
  retryBaseMs: number;
}

/**
 * A failed Bot API call. errorCode is the HTTP-style code Telegram
 * reports, or 0 when no response arrived.
 */
export class TelegramApiError extends Error {
  constructor(
    public readonly method: string,
    public readonly errorCode: number,
    public readonly description: string,
    public readonly retryAfter?: number,
  ) {
    super(`Telegram ${method} failed (${errorCode}): ${description}`);
    this.name = 'TelegramApiError';
  }

  get isNetworkError(): boolean {
    return this.errorCode === 0;
  }

  get isRetryable(): boolean {
    return this.isNetworkError || this.errorCode === 429 || this.errorCode >= 500;
  }
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Thin Bot API client. The token lives only in the request path and is
 * never part of a log line or error message.
 */
export class TelegramApiClient {
  private readonly log = new Logger(TelegramApiClient.name);
  private readonly flow = debugLog.telegram;

  constructor(
    private readonly http: AxiosInstance,
    private readonly opts: TelegramClientOptions,
  ) {}

  async call<T>(method: string, payload: object = {}): Promise<T> {
    return withRetry(() => this.request<T>(method, payload), {
      maxAttempts: this.opts.maxAttempts,
      baseDelayMs: this.opts.retryBaseMs,
      maxDelayMs: 10_000,
      shouldRetry: (err) => err instanceof TelegramApiError && err.isRetryable,
      delayFor: (err) =>
        err instanceof TelegramApiError && err.retryAfter !== undefined
          ? err.retryAfter * 1000
          : undefined,
      onRetry: (err, attempt, delayMs) => {
        const reason = err instanceof TelegramApiError ? err.description : String(err);
        this.log.warn(
          `Telegram ${method} attempt ${attempt}/${this.opts.maxAttempts} failed: ${reason}, retrying in ${delayMs}ms`,
        );
      },
    });
  }

  getMe(): Promise<TelegramUser> {
    return this.call<TelegramUser>('getMe');
  }

  async sendMessage(params: SendMessageParams): Promise<TelegramMessage> {
    const msg = await this.call<TelegramMessage>('sendMessage', params);
    this.flow.send('Message sent', { chat: params.chat_id, id: msg.message_id });
    return msg;
  }

  /** Resolves to the id of the new message in the target chat. */
  async forwardMessage(params: ForwardMessageParams): Promise<number> {
    const msg = await this.call<TelegramMessage>('forwardMessage', params);
    return msg.message_id;
  }

  answerCallbackQuery(params: AnswerCallbackQueryParams): Promise<boolean> {
    return this.call<boolean>('answerCallbackQuery', params);
  }

  // Telegram answers `true` instead of a Message for inline messages
  editMessageText(params: EditMessageTextParams): Promise<TelegramMessage | true> {
    return this.call<TelegramMessage | true>('editMessageText', params);
  }

  setWebhook(params: SetWebhookParams): Promise<boolean> {
    return this.call<boolean>('setWebhook', params);
  }

  deleteWebhook(dropPendingUpdates: boolean): Promise<boolean> {
    return this.call<boolean>('deleteWebhook', {
      drop_pending_updates: dropPendingUpdates,
    });
  }

  getWebhookInfo(): Promise<WebhookInfo> {
    return this.call<WebhookInfo>('getWebhookInfo');
  }

  private async request<T>(method: string, payload: object): Promise<T> {
    this.flow.link(method);
    try {
      const res = await this.http.post<TelegramResponse<T>>(
        `/bot${this.opts.token}/${method}`,
        payload,
      );
      return this.unwrap(method, res.data);
    } catch (err) {
      throw this.toApiError(method, err);
    }
  }

  private unwrap<T>(method: string, body: TelegramResponse<T>): T {
    if (body.ok) {
      return body.result;
    }
    throw new TelegramApiError(
      method,
      body.error_code,
      body.description,
      body.parameters?.retry_after,
    );
  }

  private toApiError(method: string, err: unknown): TelegramApiError {
    if (err instanceof TelegramApiError) return err;

    if (axios.isAxiosError(err)) {
      const data: unknown = err.response?.data;
      if (isObject(data) && data.ok === false && typeof data.description === 'string') {
        const params = isObject(data.parameters) ? data.parameters : undefined;
        return new TelegramApiError(
          method,
          typeof data.error_code === 'number' ? data.error_code : (err.response?.status ?? 0),
          data.description,
          typeof params?.retry_after === 'number' ? params.retry_after : undefined,
        );
      }
      if (err.response) {
        return new TelegramApiError(
          method,
          err.response.status,
          err.response.statusText || 'Unexpected response',
        );
      }
      return new TelegramApiError(method, 0, err.code ?? 'Network error');
    }

    return new TelegramApiError(
      method,
      0,
      err instanceof Error ? err.message : String(err),
    );
  }
}
