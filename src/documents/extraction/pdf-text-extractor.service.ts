/**
 * PDF Text Extractor
 *
 * Uses LangChain.js PDFLoader (pdf-parse) to extract plain text from a PDF.
 */

import { Injectable, Logger } from '@nestjs/common';
import { PDFLoader } from '@langchain/community/document_loaders/fs/pdf';
import {
  CorruptedPdfError,
  ExtractionError,
  PasswordProtectedPdfError,
} from '../errors/extraction-errors';
import type { ExtractedText } from '../types';

/** Separator placed between pages of the extracted text */
export const PAGE_SEPARATOR = '\n\n';

@Injectable()
export class PdfTextExtractorService {
  private readonly logger = new Logger(PdfTextExtractorService.name);

  /**
   * Extract the text of every page
   *
   * @param filePath - Path to the downloaded PDF
   * @param fileId - File identifier for error reporting
   * @throws PasswordProtectedPdfError if the PDF is encrypted
   * @throws CorruptedPdfError if the PDF cannot be parsed
   */
  async extract(filePath: string, fileId: string): Promise<ExtractedText> {
    const startTime = Date.now();

    this.logger.log(`Extracting text from PDF: ${filePath}`);

    try {
      const loader = new PDFLoader(filePath, {
        splitPages: true,
        parsedItemSeparator: ' ',
      });

      const pages = await loader.load();
      const text = pages.map((page) => page.pageContent).join(PAGE_SEPARATOR);

      this.logger.log(
        `PDF extraction complete - Duration: ${Date.now() - startTime}ms, ` +
          `Pages: ${pages.length}, Characters: ${text.length}`,
      );

      return { text, pageCount: pages.length };
    } catch (error) {
      this.logger.error(
        `PDF extraction failed - Duration: ${Date.now() - startTime}ms, File: ${filePath}`,
        error instanceof Error ? error.stack : String(error),
      );

      throw this.classifyError(error, fileId, filePath);
    }
  }

  /**
   * True when the document holds no extractable text (e.g. scanned images)
   */
  isEmpty(extracted: ExtractedText): boolean {
    return extracted.text.trim().length === 0;
  }

  private classifyError(
    error: unknown,
    fileId: string,
    filePath: string,
  ): ExtractionError {
    if (!(error instanceof Error)) {
      return new CorruptedPdfError(
        fileId,
        filePath,
        'Failed to parse PDF file',
      );
    }

    const errorMessage = error.message.toLowerCase();

    if (
      error.name === 'PasswordException' ||
      errorMessage.includes('password') ||
      errorMessage.includes('encrypted')
    ) {
      return new PasswordProtectedPdfError(fileId, filePath, error);
    }

    return new CorruptedPdfError(fileId, filePath, error.message, error);
  }
}
