import { IncomingUpdate } from '../contracts';
import { HandlerOutcome } from './handler-result';

/**
 * A self-describing handler for one kind of update.
 *
 * The registry asks each handler in registration order whether it
 * accepts the update; the first match runs.
 */
export interface UpdateHandler {
  /** Unique identifier, used in logs. */
  readonly name: string;

  canHandle(update: IncomingUpdate): boolean;

  /**
   * @param cid - Correlation id of the webhook request, for logging
   */
  handle(update: IncomingUpdate, cid: string): Promise<HandlerOutcome>;
}
