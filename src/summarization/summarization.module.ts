/**
 * Summarization Module
 * Wires the completion client, chunker and summarizer
 */

import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { SummarizationService } from './summarization.service';
import { TextChunkerService } from './services/text-chunker.service';
import { LLMProviderFactory } from './providers/llm-provider.factory';
import { LangChainCompletionClient } from './providers/langchain-completion.client';
import { COMPLETION_CLIENT } from './providers/completion-client.interface';

@Module({
  imports: [ConfigModule],
  providers: [
    SummarizationService,
    TextChunkerService,
    LLMProviderFactory,
    {
      provide: COMPLETION_CLIENT,
      useFactory: (
        configService: ConfigService,
        factory: LLMProviderFactory,
      ): LangChainCompletionClient =>
        LangChainCompletionClient.fromConfig(configService, factory),
      inject: [ConfigService, LLMProviderFactory],
    },
  ],
  exports: [SummarizationService],
})
export class SummarizationModule {}
