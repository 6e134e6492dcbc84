import { TELEGRAM_MESSAGE_LIMIT } from '../constants/bot-messages';

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/**
 * Split a reply into parts Telegram accepts as single messages.
 * A cut never falls inside a surrogate pair, so each part is valid UTF-8.
 */
export function splitMessage(
  text: string,
  limit: number = TELEGRAM_MESSAGE_LIMIT,
): string[] {
  if (!Number.isInteger(limit) || limit < 2) {
    throw new RangeError(`limit must be an integer >= 2, got ${limit}`);
  }

  const parts: string[] = [];
  let start = 0;

  while (start < text.length) {
    let end = Math.min(start + limit, text.length);
    if (end < text.length && isHighSurrogate(text.charCodeAt(end - 1))) {
      end -= 1;
    }
    parts.push(text.slice(start, end));
    start = end;
  }

  return parts;
}
