import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { HumanMessage, SystemMessage } from '@langchain/core/messages';
import { getNumber, getPositiveInt } from '../../shared/config/config.utils';
import {
  CompletionNotConfiguredError,
  CompletionServiceError,
} from '../errors/summarization-errors';
import type { CompletionClient } from './completion-client.interface';
import {
  LLMProviderFactory,
  PROVIDER_CREDENTIAL_KEYS,
  type LLMProvider,
} from './llm-provider.factory';

export interface LangChainCompletionOptions {
  provider: LLMProvider;
  modelName: string;
  timeoutMs: number;
}

/**
 * CompletionClient backed by a LangChain chat model.
 * A null model means the provider credential was missing at startup.
 */
export class LangChainCompletionClient implements CompletionClient {
  private readonly logger = new Logger(LangChainCompletionClient.name);

  constructor(
    private readonly model: BaseChatModel | null,
    private readonly options: LangChainCompletionOptions,
  ) {}

  /**
   * Build the client from SUMMARY_* and LLM_* settings.
   * A missing credential is logged, not thrown, so the bot can still
   * answer commands; summarization then fails with a configuration error.
   */
  static fromConfig(
    configService: ConfigService,
    factory: LLMProviderFactory,
  ): LangChainCompletionClient {
    const logger = new Logger(LangChainCompletionClient.name);
    const provider = factory.getDefaultProvider();
    const timeoutMs =
      getPositiveInt(configService, 'SUMMARY_TIMEOUT', 120) * 1000;

    if (!factory.isProviderConfigured(provider)) {
      logger.warn(
        `${PROVIDER_CREDENTIAL_KEYS[provider]} is missing. Summaries will fail.`,
      );
      return new LangChainCompletionClient(null, {
        provider,
        modelName: `${provider}:unconfigured`,
        timeoutMs,
      });
    }

    const model = factory.createChatModel(provider, {
      model: configService.get<string>('SUMMARY_MODEL'),
      temperature: getNumber(configService, 'SUMMARY_TEMPERATURE', 0.3),
      maxTokens: getPositiveInt(configService, 'SUMMARY_MAX_TOKENS', 1024),
      maxRetries: Math.max(0, getNumber(configService, 'LLM_MAX_RETRIES', 2)),
    });
    const modelName = factory.getModelName(provider, model);

    logger.log(`Summary generation initialized: [${modelName}]`);

    return new LangChainCompletionClient(model, {
      provider,
      modelName,
      timeoutMs,
    });
  }

  isConfigured(): boolean {
    return this.model !== null;
  }

  assertConfigured(): void {
    if (!this.model) {
      throw this.notConfigured();
    }
  }

  async complete(systemPrompt: string, userPrompt: string): Promise<string> {
    if (!this.model) {
      throw this.notConfigured();
    }

    const startTime = Date.now();

    try {
      const response = await this.model.invoke(
        [new SystemMessage(systemPrompt), new HumanMessage(userPrompt)],
        { timeout: this.options.timeoutMs },
      );

      this.logger.debug(
        `[${this.options.modelName}] Completion finished in ${Date.now() - startTime}ms`,
      );

      return response.text;
    } catch (error) {
      this.logger.error(
        `[${this.options.modelName}] Completion failed after ${Date.now() - startTime}ms`,
        error instanceof Error ? error.stack : String(error),
      );
      throw new CompletionServiceError(
        this.options.modelName,
        error instanceof Error ? error : new Error(String(error)),
      );
    }
  }

  getModelName(): string {
    return this.options.modelName;
  }

  private notConfigured(): CompletionNotConfiguredError {
    return new CompletionNotConfiguredError(
      this.options.provider,
      PROVIDER_CREDENTIAL_KEYS[this.options.provider] ?? 'credential',
    );
  }
}
