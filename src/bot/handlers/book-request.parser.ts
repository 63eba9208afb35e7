export interface BookRequest {
  /** Message id of the post in the private channel. */
  messageId: number;
}

/**
 * Accepts "123" or "#123" (ASCII digits only, surrounding spaces ignored).
 */
export function parseBookRequest(text: string): BookRequest | null {
  const match = /^#?(\d+)$/.exec(text.trim());
  if (!match) return null;

  const messageId = Number(match[1]);
  if (!Number.isSafeInteger(messageId) || messageId <= 0) return null;

  return { messageId };
}
