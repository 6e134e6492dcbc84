/**
 * Summarization Errors
 */

import { BotError, ConfigurationError } from '../../shared/errors/bot-error';

/**
 * The selected LLM provider has no credential configured.
 * Raised before any completion call is attempted.
 */
export class CompletionNotConfiguredError extends ConfigurationError {
  constructor(
    public readonly provider: string,
    public readonly credentialKey: string,
  ) {
    super(
      `${credentialKey} is not set, summaries are unavailable.`,
      'SUMMARY_NOT_CONFIGURED',
    );
  }
}

/**
 * A completion call failed (network, quota, rate limit, malformed response).
 * The whole summarization fails with it.
 */
export class CompletionServiceError extends BotError {
  constructor(
    public readonly model: string,
    originalError?: Error,
  ) {
    super(
      `Completion request to ${model} failed: ${originalError?.message ?? 'unknown error'}`,
      'SUMMARY_COMPLETION_FAILED',
      true,
      originalError,
    );
  }
}
