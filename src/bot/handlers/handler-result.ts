export type HandlerAction =
  | 'welcome'
  | 'help'
  | 'guide'
  | 'book_sent'
  | 'book_failed'
  | 'invalid_request'
  | 'ignored';

export interface HandlerOutcome {
  handled: boolean;
  action: HandlerAction;
  /** Bot API description when a user-facing failure was reported. */
  error?: string;
}

export const IGNORED: HandlerOutcome = { handled: false, action: 'ignored' };
