/**
 * Completion capability used by the summarizer:
 * one system prompt plus one user prompt in, generated text out.
 */
export interface CompletionClient {
  /** False when the provider credential is missing */
  isConfigured(): boolean;

  /**
   * @throws ConfigurationError when not configured
   */
  assertConfigured(): void;

  complete(systemPrompt: string, userPrompt: string): Promise<string>;
}

export const COMPLETION_CLIENT = Symbol('COMPLETION_CLIENT');
