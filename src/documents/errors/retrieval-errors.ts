/**
 * Document Retrieval Errors
 */

import { BotError } from '../../shared/errors/bot-error';

export abstract class RetrievalError extends BotError {}

/**
 * Non-2xx response from the file endpoint (permanent)
 */
export class DownloadHttpError extends RetrievalError {
  constructor(
    public readonly status: number,
    originalError?: Error,
  ) {
    super(
      `Download failed with HTTP status ${status}`,
      'DOWNLOAD_HTTP_ERROR',
      status >= 500 || status === 429,
      originalError,
    );
  }
}

/**
 * No complete response within DOWNLOAD_TIMEOUT_MS (temporary)
 */
export class DownloadTimeoutError extends RetrievalError {
  constructor(timeoutMs: number, originalError?: Error) {
    super(
      `Download timed out after ${timeoutMs}ms`,
      'DOWNLOAD_TIMEOUT',
      true,
      originalError,
    );
  }
}

/**
 * Connection failure or broken stream (temporary)
 */
export class DownloadNetworkError extends RetrievalError {
  constructor(message: string, originalError?: Error) {
    super(
      `Download failed: ${message}`,
      'DOWNLOAD_NETWORK_ERROR',
      true,
      originalError,
    );
  }
}

/**
 * Temp directory could not be created (temporary)
 */
export class TempStorageError extends RetrievalError {
  constructor(path: string, originalError?: Error) {
    super(
      `Cannot create temporary directory: ${path}`,
      'DOWNLOAD_TEMP_STORAGE',
      true,
      originalError,
    );
  }
}

/**
 * The messaging platform returned no downloadable path for the file (permanent)
 */
export class FileUnavailableError extends RetrievalError {
  constructor(public readonly fileId: string) {
    super(
      `File ${fileId} is not available for download`,
      'DOWNLOAD_FILE_UNAVAILABLE',
      false,
    );
  }
}
