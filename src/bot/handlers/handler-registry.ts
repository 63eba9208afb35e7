import { Inject, Injectable, Logger } from '@nestjs/common';
import { IncomingUpdate } from '../contracts';
import { RELAY_CONFIG, RelayConfig } from '../relay.config';
import { TelegramApiClient } from '../services/telegram-api.client';
import { BookRequestHandler } from './book-request.handler';
import { CallbackHandler } from './callback.handler';
import { HelpHandler } from './help.handler';
import { StartHandler } from './start.handler';
import { UpdateHandler } from './update-handler.interface';

/**
 * Ordered registry of update handlers.
 *
 * Resolution walks handlers in registration order, so command handlers
 * are registered ahead of the plain-text book request handler.
 */
@Injectable()
export class HandlerRegistry {
  private readonly log = new Logger(HandlerRegistry.name);
  private readonly handlers: UpdateHandler[] = [];

  constructor(
    telegram: TelegramApiClient,
    @Inject(RELAY_CONFIG) cfg: RelayConfig,
  ) {
    this.registerAll([
      new StartHandler(telegram, cfg),
      new HelpHandler(telegram, cfg),
      new CallbackHandler(telegram, cfg),
      new BookRequestHandler(telegram, cfg),
    ]);

    this.log.log(
      `HandlerRegistry initialized with ${this.handlers.length} handlers: ${this.getHandlerNames().join(', ')}`,
    );
  }

  /**
   * Appends a handler. A second handler with an existing name is skipped.
   */
  register(handler: UpdateHandler): void {
    if (this.handlers.some((h) => h.name === handler.name)) {
      this.log.warn(`Handler "${handler.name}" already registered, skipping`);
      return;
    }

    this.handlers.push(handler);
    this.log.debug(`Registered handler: ${handler.name}`);
  }

  registerAll(handlers: UpdateHandler[]): void {
    for (const handler of handlers) {
      this.register(handler);
    }
  }

  /**
   * First handler accepting the update, or null when none does
   * (unknown commands, for instance).
   */
  resolve(update: IncomingUpdate): UpdateHandler | null {
    return this.handlers.find((h) => h.canHandle(update)) ?? null;
  }

  getHandlerNames(): string[] {
    return this.handlers.map((h) => h.name);
  }
}
