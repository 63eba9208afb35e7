export interface BotCommand {
  name: string; // lower-case, without the leading slash or @BotName suffix
  args: string;
}

export interface MessageUpdate {
  kind: 'message';
  updateId: number;
  chatId: number;
  messageId: number;
  text: string; // trimmed
  command: BotCommand | null;
  from: { id: number; username?: string; firstName?: string } | null;
}

export interface CallbackUpdate {
  kind: 'callback';
  updateId: number;
  callbackId: string;
  chatId: number;
  messageId: number;
  data: string;
}

export type IncomingUpdate = MessageUpdate | CallbackUpdate;
