/**
 * LLM Provider Factory
 * Creates chat models from multiple providers (OpenAI, Google, Anthropic, Ollama)
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ChatOpenAI } from '@langchain/openai';
import { ChatGoogleGenerativeAI } from '@langchain/google-genai';
import { ChatAnthropic } from '@langchain/anthropic';
import { ChatOllama } from '@langchain/ollama';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { CompletionNotConfiguredError } from '../errors/summarization-errors';

export const LLM_PROVIDERS = ['openai', 'google', 'anthropic', 'ollama'] as const;

export type LLMProvider = (typeof LLM_PROVIDERS)[number];

/**
 * Credential each hosted provider needs. Ollama runs locally without one.
 */
export const PROVIDER_CREDENTIAL_KEYS: Record<LLMProvider, string | null> = {
  openai: 'OPENAI_API_KEY',
  google: 'GOOGLE_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
  ollama: null,
};

export interface ChatModelOptions {
  model?: string; // Override specific model
  temperature?: number;
  maxTokens?: number;
  maxRetries?: number; // Client-level retries for failed requests
}

export function isLLMProvider(value: string): value is LLMProvider {
  return (LLM_PROVIDERS as readonly string[]).includes(value);
}

@Injectable()
export class LLMProviderFactory {
  private readonly logger = new Logger(LLMProviderFactory.name);

  constructor(private readonly configService: ConfigService) {}

  /**
   * Provider selected by LLM_PROVIDER, OpenAI when unset or unknown
   */
  getDefaultProvider(): LLMProvider {
    const configured = this.configService.get<string>('LLM_PROVIDER');

    if (!configured) {
      return 'openai';
    }

    if (isLLMProvider(configured)) {
      return configured;
    }

    this.logger.warn(
      `Unknown LLM_PROVIDER "${configured}", falling back to openai`,
    );
    return 'openai';
  }

  /**
   * Create chat model based on provider
   * Timeout is passed at invocation time, not in the constructor
   * @throws CompletionNotConfiguredError if the provider's credential is missing
   */
  createChatModel(
    provider: LLMProvider = this.getDefaultProvider(),
    options?: ChatModelOptions,
  ): BaseChatModel {
    this.logger.log(`Creating chat model for provider: ${provider}`);

    switch (provider) {
      case 'openai':
        return this.createOpenAIModel(options);

      case 'google':
        return this.createGoogleModel(options);

      case 'anthropic':
        return this.createAnthropicModel(options);

      case 'ollama':
        return this.createOllamaModel(options);
    }
  }

  private createOpenAIModel(options?: ChatModelOptions): ChatOpenAI {
    const model =
      options?.model ||
      this.configService.get<string>('OPENAI_CHAT_MODEL') ||
      'gpt-4o-mini';

    return new ChatOpenAI({
      model,
      temperature: options?.temperature ?? 0.3,
      maxTokens: options?.maxTokens,
      maxRetries: options?.maxRetries ?? 2,
      configuration: {
        baseURL:
          this.configService.get<string>('OPENAI_BASE_URL') ||
          'https://api.openai.com/v1',
        apiKey: this.requireCredential('openai'),
      },
    });
  }

  private createGoogleModel(
    options?: ChatModelOptions,
  ): ChatGoogleGenerativeAI {
    const model =
      options?.model ||
      this.configService.get<string>('GOOGLE_CHAT_MODEL') ||
      'gemini-2.5-flash-lite';

    return new ChatGoogleGenerativeAI({
      model,
      temperature: options?.temperature ?? 0.3,
      maxOutputTokens: options?.maxTokens,
      maxRetries: options?.maxRetries ?? 2,
      apiKey: this.requireCredential('google'),
    });
  }

  private createAnthropicModel(options?: ChatModelOptions): ChatAnthropic {
    const model =
      options?.model ||
      this.configService.get<string>('ANTHROPIC_CHAT_MODEL') ||
      'claude-sonnet-4-5-20250929';

    return new ChatAnthropic({
      model,
      temperature: options?.temperature ?? 0.3,
      maxTokens: options?.maxTokens ?? 1024,
      maxRetries: options?.maxRetries ?? 2,
      apiKey: this.requireCredential('anthropic'),
    });
  }

  /**
   * Create Ollama chat model (local)
   */
  private createOllamaModel(options?: ChatModelOptions): ChatOllama {
    const model =
      options?.model ||
      this.configService.get<string>('OLLAMA_CHAT_MODEL') ||
      'llama3';

    return new ChatOllama({
      model,
      temperature: options?.temperature ?? 0.3,
      numPredict: options?.maxTokens,
      baseUrl:
        this.configService.get<string>('OLLAMA_BASE_URL') ||
        'http://localhost:11434',
    });
  }

  private requireCredential(provider: LLMProvider): string {
    const key = PROVIDER_CREDENTIAL_KEYS[provider];
    const value = key ? this.configService.get<string>(key) : undefined;

    if (!key || !value) {
      throw new CompletionNotConfiguredError(provider, key ?? 'credential');
    }

    return value;
  }

  /**
   * Get model identifier string for logging
   * Format: "provider:model"
   */
  getModelName(provider: LLMProvider, model: BaseChatModel): string {
    if ('model' in model && typeof model.model === 'string') {
      return `${provider}:${model.model}`;
    }

    return `${provider}:unknown`;
  }

  /**
   * Check if provider is configured
   */
  isProviderConfigured(provider: LLMProvider): boolean {
    const key = PROVIDER_CREDENTIAL_KEYS[provider];
    // Ollama is always available (local)
    return key === null || !!this.configService.get<string>(key);
  }
}
