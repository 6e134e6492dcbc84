/**
 * Document Handler
 *
 * Runs one upload through Retriever → Extractor → Summarizer and replies.
 * This is the single recovery point: every failure is logged here and turned
 * into a short reply, never rethrown.
 */

import { Injectable, Logger } from '@nestjs/common';
import { isSupportedDocumentMimeType } from '../../documents/constants/document-mime-types';
import { PdfTextExtractorService } from '../../documents/extraction/pdf-text-extractor.service';
import { DocumentRetrieverService } from '../../documents/retrieval/document-retriever.service';
import { SummarizationService } from '../../summarization/summarization.service';
import { BOT_MESSAGES, formatErrorReply } from '../constants/bot-messages';
import type {
  DocumentHandlingOutcome,
  InboundDocumentEvent,
  Replier,
} from '../types';

@Injectable()
export class DocumentHandler {
  private readonly logger = new Logger(DocumentHandler.name);

  constructor(
    private readonly retriever: DocumentRetrieverService,
    private readonly extractor: PdfTextExtractorService,
    private readonly summarizer: SummarizationService,
  ) {}

  async handle(
    event: InboundDocumentEvent,
    replier: Replier,
  ): Promise<DocumentHandlingOutcome> {
    if (!isSupportedDocumentMimeType(event.mimeType)) {
      this.logger.log(
        `Rejected document ${event.fileId}: unsupported MIME type ${event.mimeType ?? 'unknown'}`,
      );
      await this.safeReply(replier, BOT_MESSAGES.PLEASE_SEND_PDF);
      return { status: 'rejected', mimeType: event.mimeType ?? null };
    }

    const startTime = Date.now();
    this.logger.log(
      `=== Document Start === File: ${event.fileName ?? 'unnamed'} (${event.fileId}), ` +
        `Size: ${event.fileSize ?? 'unknown'} bytes`,
    );

    try {
      const url = await event.resolveDownloadUrl();
      await replier.reply(BOT_MESSAGES.PROCESSING);

      const outcome = await this.retriever.withDownloadedFile(
        { url, fileName: event.fileName },
        async (file): Promise<DocumentHandlingOutcome> => {
          const extracted = await this.extractor.extract(
            file.path,
            event.fileId,
          );

          if (this.extractor.isEmpty(extracted)) {
            return { status: 'empty', pageCount: extracted.pageCount };
          }

          const result = await this.summarizer.summarize(extracted.text);
          return { status: 'summarized', result };
        },
      );

      if (outcome.status === 'empty') {
        this.logger.log(
          `No extractable text in ${event.fileId} (${outcome.pageCount} pages)`,
        );
        await replier.reply(BOT_MESSAGES.NO_TEXT_FOUND);
      } else if (outcome.status === 'summarized') {
        await replier.reply(
          outcome.result.summary || BOT_MESSAGES.EMPTY_SUMMARY,
        );
      }

      this.logger.log(
        `=== Document Complete === File: ${event.fileId}, Status: ${outcome.status}, ` +
          `Duration: ${Date.now() - startTime}ms`,
      );

      return outcome;
    } catch (error) {
      this.logger.error(
        `=== Document Failed === File: ${event.fileId}, Duration: ${Date.now() - startTime}ms`,
        error instanceof Error ? error.stack : String(error),
      );

      await this.safeReply(replier, formatErrorReply(error));
      return { status: 'failed', error };
    }
  }

  /**
   * Reply without letting a messaging failure escape the handler
   */
  private async safeReply(replier: Replier, text: string): Promise<void> {
    try {
      await replier.reply(text);
    } catch (error) {
      this.logger.error(
        'Failed to send reply',
        error instanceof Error ? error.stack : String(error),
      );
    }
  }
}
