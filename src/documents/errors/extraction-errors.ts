/**
 * Text Extraction Errors
 */

import { BotError } from '../../shared/errors/bot-error';

export abstract class ExtractionError extends BotError {
  constructor(
    message: string,
    code: string,
    public readonly fileId: string,
    public readonly filePath: string,
    originalError?: Error,
  ) {
    super(message, code, false, originalError);
  }
}

export class CorruptedPdfError extends ExtractionError {
  constructor(
    fileId: string,
    filePath: string,
    message: string,
    originalError?: Error,
  ) {
    super(
      `PDF file is corrupted or invalid: ${message}`,
      'EXTRACT_CORRUPTED_FILE',
      fileId,
      filePath,
      originalError,
    );
  }
}

export class PasswordProtectedPdfError extends ExtractionError {
  constructor(fileId: string, filePath: string, originalError?: Error) {
    super(
      'PDF file is password-protected. Please send an unencrypted version.',
      'EXTRACT_PASSWORD_PROTECTED',
      fileId,
      filePath,
      originalError,
    );
  }
}
