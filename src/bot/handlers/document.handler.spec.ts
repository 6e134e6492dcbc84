import { Test } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { PDFLoader } from '@langchain/community/document_loaders/fs/pdf';
import { Document } from '@langchain/core/documents';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { PdfTextExtractorService } from '../../documents/extraction/pdf-text-extractor.service';
import { DownloadHttpError } from '../../documents/errors/retrieval-errors';
import { DocumentRetrieverService } from '../../documents/retrieval/document-retriever.service';
import { LocalFileServer } from '../../documents/testing/local-file-server';
import { isolateEnv } from '../../shared/testing/isolate-env';
import { CompletionNotConfiguredError } from '../../summarization/errors/summarization-errors';
import { COMPLETION_CLIENT } from '../../summarization/providers/completion-client.interface';
import { TextChunkerService } from '../../summarization/services/text-chunker.service';
import { SummarizationService } from '../../summarization/summarization.service';
import { FakeCompletionClient } from '../../summarization/testing/fake-completion.client';
import { BOT_MESSAGES } from '../constants/bot-messages';
import type { InboundDocumentEvent, Replier } from '../types';
import { DocumentHandler } from './document.handler';

class RecordingReplier implements Replier {
  readonly replies: string[] = [];

  async reply(text: string): Promise<void> {
    this.replies.push(text);
  }
}

describe('DocumentHandler', () => {
  isolateEnv([
    'DOWNLOAD_TEMP_DIR',
    'DOWNLOAD_TIMEOUT_MS',
    'SUMMARY_CHUNK_SIZE',
    'SUMMARY_CONCURRENCY',
  ]);

  const server = new LocalFileServer();
  let tempDir: string;
  let load: jest.SpyInstance<Promise<Document[]>, []>;

  async function createHandler(
    client: FakeCompletionClient,
  ): Promise<DocumentHandler> {
    const moduleRef = await Test.createTestingModule({
      providers: [
        DocumentHandler,
        DocumentRetrieverService,
        PdfTextExtractorService,
        SummarizationService,
        TextChunkerService,
        {
          provide: ConfigService,
          useValue: new ConfigService({ DOWNLOAD_TEMP_DIR: tempDir }),
        },
        { provide: COMPLETION_CLIENT, useValue: client },
      ],
    }).compile();

    return moduleRef.get(DocumentHandler);
  }

  function pdfEvent(
    overrides: Partial<InboundDocumentEvent> = {},
  ): InboundDocumentEvent {
    const url = server.serve('/files/report.pdf', '%PDF-1.4\nplaceholder\n%%EOF');
    return {
      fileId: 'file-1',
      mimeType: 'application/pdf',
      fileName: 'report.pdf',
      fileSize: 27,
      resolveDownloadUrl: () => Promise.resolve(url),
      ...overrides,
    };
  }

  beforeAll(async () => {
    await server.start();
  });

  afterAll(async () => {
    await server.stop();
  });

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'handler-spec-'));
    load = jest.spyOn(PDFLoader.prototype, 'load');
  });

  afterEach(async () => {
    load.mockRestore();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('replies with the final summary', async () => {
    load.mockResolvedValue([
      new Document({ pageContent: 'Page one.' }),
      new Document({ pageContent: 'Page two.' }),
    ]);
    const client = new FakeCompletionClient();
    const handler = await createHandler(client);
    const replier = new RecordingReplier();

    const outcome = await handler.handle(pdfEvent(), replier);

    expect(replier.replies).toEqual([BOT_MESSAGES.PROCESSING, 'summary 2']);
    expect(outcome).toMatchObject({
      status: 'summarized',
      result: { summary: 'summary 2', fragmentCount: 1 },
    });
    expect(client.calls[0].userPrompt).toBe(
      'Summarize this section of the text:\n\nPage one.\n\nPage two.',
    );
    expect(await fs.readdir(tempDir)).toEqual([]);
  });

  it.each(['image/png', 'text/plain'])(
    'rejects %s without downloading',
    async (mimeType) => {
      const client = new FakeCompletionClient();
      const handler = await createHandler(client);
      const replier = new RecordingReplier();
      const resolveDownloadUrl = jest.fn();

      const outcome = await handler.handle(
        pdfEvent({ mimeType, resolveDownloadUrl }),
        replier,
      );

      expect(outcome).toEqual({ status: 'rejected', mimeType });
      expect(replier.replies).toEqual(['Please send a PDF file only.']);
      expect(resolveDownloadUrl).not.toHaveBeenCalled();
      expect(client.calls).toHaveLength(0);
    },
  );

  it('rejects a document without a MIME type', async () => {
    const handler = await createHandler(new FakeCompletionClient());
    const replier = new RecordingReplier();

    const outcome = await handler.handle(
      pdfEvent({ mimeType: undefined }),
      replier,
    );

    expect(outcome).toEqual({ status: 'rejected', mimeType: null });
  });

  it('reports a PDF without a text layer', async () => {
    load.mockResolvedValue([new Document({ pageContent: ' \n ' })]);
    const client = new FakeCompletionClient();
    const handler = await createHandler(client);
    const replier = new RecordingReplier();

    const outcome = await handler.handle(pdfEvent(), replier);

    expect(outcome).toEqual({ status: 'empty', pageCount: 1 });
    expect(replier.replies).toEqual([
      BOT_MESSAGES.PROCESSING,
      'No extractable text was found in this PDF.',
    ]);
    expect(client.calls).toHaveLength(0);
  });

  it('reports missing summarizer configuration', async () => {
    load.mockResolvedValue([new Document({ pageContent: 'Some text.' })]);
    const handler = await createHandler(new FakeCompletionClient(false));
    const replier = new RecordingReplier();

    const outcome = await handler.handle(pdfEvent(), replier);

    expect(outcome.status).toBe('failed');
    expect(outcome).toMatchObject({
      error: expect.any(CompletionNotConfiguredError),
    });
    expect(replier.replies).toEqual([
      BOT_MESSAGES.PROCESSING,
      'Error: OPENAI_API_KEY is not set, summaries are unavailable.',
    ]);
  });

  it('reports a failed download', async () => {
    const handler = await createHandler(new FakeCompletionClient());
    const replier = new RecordingReplier();

    const outcome = await handler.handle(
      pdfEvent({
        resolveDownloadUrl: () => Promise.resolve(server.url('/status/404')),
      }),
      replier,
    );

    expect(outcome).toMatchObject({
      status: 'failed',
      error: expect.any(DownloadHttpError),
    });
    expect(replier.replies).toEqual([
      BOT_MESSAGES.PROCESSING,
      'Error: Download failed with HTTP status 404',
    ]);
    expect(load).not.toHaveBeenCalled();
    expect(await fs.readdir(tempDir)).toEqual([]);
  });

  it('reports a password-protected PDF', async () => {
    const passwordError = new Error('No password given');
    passwordError.name = 'PasswordException';
    load.mockRejectedValue(passwordError);
    const client = new FakeCompletionClient();
    const handler = await createHandler(client);
    const replier = new RecordingReplier();

    await handler.handle(pdfEvent(), replier);

    expect(replier.replies).toEqual([
      BOT_MESSAGES.PROCESSING,
      'Error: PDF file is password-protected. Please send an unencrypted version.',
    ]);
    expect(client.calls).toHaveLength(0);
    expect(await fs.readdir(tempDir)).toEqual([]);
  });

  it('replies with the fallback when the summary is blank', async () => {
    load.mockResolvedValue([new Document({ pageContent: 'Some text.' })]);
    const handler = await createHandler(
      new FakeCompletionClient(true, () => Promise.resolve('   ')),
    );
    const replier = new RecordingReplier();

    await handler.handle(pdfEvent(), replier);

    expect(replier.replies).toEqual([
      BOT_MESSAGES.PROCESSING,
      'The summary came back empty. Please try again later.',
    ]);
  });

  it('survives a reply channel that keeps failing', async () => {
    const handler = await createHandler(new FakeCompletionClient());
    const sendFailure = new Error('chat not found');
    const replier: Replier = { reply: jest.fn().mockRejectedValue(sendFailure) };

    const outcome = await handler.handle(pdfEvent(), replier);

    expect(outcome).toEqual({ status: 'failed', error: sendFailure });
    expect(replier.reply).toHaveBeenCalledTimes(2);
    expect(replier.reply).toHaveBeenLastCalledWith('Error: chat not found');
  });
});
