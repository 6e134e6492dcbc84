/**
 * Base class for every error raised while serving a bot request.
 * `code` is stable for logs; `retryable` marks transient failures.
 */
export abstract class BotError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly retryable: boolean,
    public readonly originalError?: Error,
  ) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * A required credential or setting is missing.
 * Detected before any external call is attempted.
 */
export abstract class ConfigurationError extends BotError {
  constructor(message: string, code: string) {
    super(message, code, false);
  }
}

export class MissingBotTokenError extends ConfigurationError {
  constructor() {
    super(
      'TELEGRAM_BOT_TOKEN is not set, the bot cannot start.',
      'CONFIG_MISSING_BOT_TOKEN',
    );
  }
}

