import { Injectable } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { debugLog } from '../common/utils/debug-logger';
import { IncomingUpdate } from './contracts';
import { HandlerRegistry } from './handlers/handler-registry';
import { HandlerOutcome, IGNORED } from './handlers/handler-result';
import { UpdateDedupService } from './services/update-dedup.service';

@Injectable()
export class BotService {
  private readonly log = debugLog.bot;
  private ready = false;

  constructor(
    private readonly registry: HandlerRegistry,
    private readonly dedup: UpdateDedupService,
  ) {}

  /** Set once the webhook is registered; until then updates get 503. */
  markReady(): void {
    this.ready = true;
  }

  isReady(): boolean {
    return this.ready;
  }

  async handle(update: IncomingUpdate): Promise<HandlerOutcome> {
    const cid = this.generateCorrelationId();

    this.log.separator(cid);
    this.log.recv(
      `${update.kind} update`,
      update.kind === 'message'
        ? { id: update.updateId, chat: update.chatId, text: update.text.substring(0, 50) }
        : { id: update.updateId, chat: update.chatId, data: update.data },
      cid,
    );

    const state = await this.dedup.begin(update.updateId);
    if (state !== 'new') {
      this.log.state(`Duplicate ignored (${state})`, { id: update.updateId }, cid);
      return IGNORED;
    }

    const handler = this.registry.resolve(update);
    if (!handler) {
      this.log.skip('No handler for update', { id: update.updateId }, cid);
      await this.dedup.complete(update.updateId);
      return IGNORED;
    }

    const done = this.log.timer(`Handler ${handler.name}`, cid);
    try {
      const outcome = await handler.handle(update, cid);
      await this.dedup.complete(update.updateId);
      done();
      this.log.ok('Update handled', { handler: handler.name, action: outcome.action }, cid);
      return outcome;
    } catch (err) {
      this.log.err('Update failed', { handler: handler.name, error: String(err) }, cid);
      await this.dedup.abandon(update.updateId);
      throw err;
    }
  }

  private generateCorrelationId(): string {
    return randomUUID().substring(0, 8);
  }
}
