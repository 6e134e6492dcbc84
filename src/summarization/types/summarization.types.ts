/**
 * Summarization Types
 */

export interface SummaryResult {
  /** Final summary, trimmed */
  summary: string;

  /** One trimmed partial summary per fragment, in fragment order */
  partialSummaries: string[];

  fragmentCount: number;

  durationMs: number;
}

export interface SummarizeOptions {
  /** Override the configured fragment size */
  maxChars?: number;
}
