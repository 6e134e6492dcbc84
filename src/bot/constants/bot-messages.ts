/**
 * User-facing bot replies
 */

export const BOT_MESSAGES = {
  GREETING: "Hi! Send me a PDF file and I'll summarize it for you.",
  HELP: [
    'How to use:',
    '- /start shows the welcome message',
    '- /help shows this help',
    '- Send a PDF file to get its summary',
  ].join('\n'),
  UNKNOWN_COMMAND: 'Unknown command.',
  PLEASE_SEND_PDF: 'Please send a PDF file only.',
  PROCESSING: 'File received. Processing...',
  NO_TEXT_FOUND: 'No extractable text was found in this PDF.',
  EMPTY_SUMMARY: 'The summary came back empty. Please try again later.',
} as const;

/** Telegram rejects text messages longer than this */
export const TELEGRAM_MESSAGE_LIMIT = 4096;

export function formatErrorReply(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return `Error: ${message}`;
}
