/**
 * Documents Module
 * Download and text extraction for uploaded documents
 */

import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { DocumentRetrieverService } from './retrieval/document-retriever.service';
import { PdfTextExtractorService } from './extraction/pdf-text-extractor.service';

@Module({
  imports: [ConfigModule],
  providers: [DocumentRetrieverService, PdfTextExtractorService],
  exports: [DocumentRetrieverService, PdfTextExtractorService],
})
export class DocumentsModule {}
