/**
 * MIME types accepted for summarization
 */

export const SUPPORTED_DOCUMENT_MIME_TYPES = ['application/pdf'] as const;

export type SupportedDocumentMimeType =
  (typeof SUPPORTED_DOCUMENT_MIME_TYPES)[number];

export function isSupportedDocumentMimeType(
  mimeType: string | null | undefined,
): mimeType is SupportedDocumentMimeType {
  return SUPPORTED_DOCUMENT_MIME_TYPES.some((allowed) => allowed === mimeType);
}

/** File name used when the upload carries none */
export const DEFAULT_DOCUMENT_FILENAME = 'document.pdf';
