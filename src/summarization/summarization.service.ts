/**
 * Summarization Service
 *
 * Chunk-and-reduce summarization:
 * text → fragments → one partial summary per fragment → one final summary
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { getPositiveInt } from '../shared/config/config.utils';
import { BotError } from '../shared/errors/bot-error';
import {
  FRAGMENT_SYSTEM_PROMPT,
  PARTIAL_SUMMARY_SEPARATOR,
  REDUCE_SYSTEM_PROMPT,
  buildFragmentPrompt,
  buildReducePrompt,
} from './constants/prompts';
import { CompletionServiceError } from './errors/summarization-errors';
import {
  COMPLETION_CLIENT,
  type CompletionClient,
} from './providers/completion-client.interface';
import { TextChunkerService } from './services/text-chunker.service';
import type { SummarizeOptions, SummaryResult } from './types';

@Injectable()
export class SummarizationService {
  private readonly logger = new Logger(SummarizationService.name);
  private readonly concurrency: number;

  constructor(
    @Inject(COMPLETION_CLIENT)
    private readonly completionClient: CompletionClient,
    private readonly chunker: TextChunkerService,
    private readonly configService: ConfigService,
  ) {
    this.concurrency = getPositiveInt(
      this.configService,
      'SUMMARY_CONCURRENCY',
      1,
    );
  }

  /**
   * Summarize text of any length
   * @throws ConfigurationError if the completion client is not configured
   * @throws CompletionServiceError if any completion call fails
   */
  async summarize(
    text: string,
    options?: SummarizeOptions,
  ): Promise<SummaryResult> {
    const startTime = Date.now();

    // Fail fast before any network call
    this.completionClient.assertConfigured();

    const fragments = this.chunker.split(text, options?.maxChars);

    if (fragments.length === 0) {
      this.logger.warn('Nothing to summarize: text is empty');
      return {
        summary: '',
        partialSummaries: [],
        fragmentCount: 0,
        durationMs: Date.now() - startTime,
      };
    }

    const partialSummaries = await this.summarizeFragments(fragments);
    const summary = await this.reduce(partialSummaries);

    const durationMs = Date.now() - startTime;
    this.logger.log(
      `Summary completed - Fragments: ${fragments.length}, ` +
        `Length: ${summary.length} chars, Duration: ${durationMs}ms`,
    );

    return {
      summary,
      partialSummaries,
      fragmentCount: fragments.length,
      durationMs,
    };
  }

  /**
   * Summarize each fragment, in batches of SUMMARY_CONCURRENCY
   * (sequential by default). Results keep fragment order.
   */
  async summarizeFragments(fragments: string[]): Promise<string[]> {
    const partialSummaries = new Array<string>(fragments.length);

    for (let i = 0; i < fragments.length; i += this.concurrency) {
      const batch = fragments.slice(i, i + this.concurrency);

      await Promise.all(
        batch.map(async (fragment, offset) => {
          const index = i + offset;
          this.logger.log(
            `Summarizing chunk ${index + 1}/${fragments.length} (size=${fragment.length})`,
          );

          const partial = await this.callCompletion(
            FRAGMENT_SYSTEM_PROMPT,
            buildFragmentPrompt(fragment),
          );
          partialSummaries[index] = partial.trim();
        }),
      );
    }

    return partialSummaries;
  }

  /**
   * Reduce ordered partial summaries into the final summary
   */
  async reduce(partialSummaries: string[]): Promise<string> {
    this.logger.log(
      `Reducing ${partialSummaries.length} partial summaries into final summary`,
    );

    const combined = partialSummaries.join(PARTIAL_SUMMARY_SEPARATOR);
    const finalSummary = await this.callCompletion(
      REDUCE_SYSTEM_PROMPT,
      buildReducePrompt(combined),
    );

    return finalSummary.trim();
  }

  private async callCompletion(
    systemPrompt: string,
    userPrompt: string,
  ): Promise<string> {
    try {
      return await this.completionClient.complete(systemPrompt, userPrompt);
    } catch (error) {
      if (error instanceof BotError) {
        throw error;
      }
      throw new CompletionServiceError(
        'completion client',
        error instanceof Error ? error : new Error(String(error)),
      );
    }
  }
}
