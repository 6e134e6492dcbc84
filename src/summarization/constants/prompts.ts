/**
 * Prompts for the chunk-and-reduce summarization
 */

export const FRAGMENT_SYSTEM_PROMPT =
  'You are an accurate and well-organized summarizer.';

export const REDUCE_SYSTEM_PROMPT =
  'Produce a single coherent final summary with short headings.';

/** Separator placed between partial summaries before the final reduction */
export const PARTIAL_SUMMARY_SEPARATOR = '\n\n---\n\n';

export function buildFragmentPrompt(fragment: string): string {
  return `Summarize this section of the text:\n\n${fragment}`;
}

export function buildReducePrompt(partialSummaries: string): string {
  return `Turn these section summaries into one final summary:\n\n${partialSummaries}`;
}
