/**
 * Bot Types
 */

import type { SummaryResult } from '../../summarization/types';

/**
 * A document upload, independent of the messaging client
 */
export interface InboundDocumentEvent {
  fileId: string;
  mimeType?: string;
  fileName?: string;
  fileSize?: number;

  /** Resolves the URL the file bytes can be downloaded from */
  resolveDownloadUrl(): Promise<string>;
}

/**
 * Sends text back to the conversation the event came from
 */
export interface Replier {
  reply(text: string): Promise<void>;
}

export type DocumentHandlingOutcome =
  | { status: 'rejected'; mimeType: string | null }
  | { status: 'empty'; pageCount: number }
  | { status: 'summarized'; result: SummaryResult }
  | { status: 'failed'; error: unknown };

export type BotCommand = 'start' | 'help';
