/**
 * Document Types
 */

export interface DownloadSource {
  url: string;

  /** Original file name; only its base name is used on disk */
  fileName?: string;
}

export interface DownloadedFile {
  /** Absolute path of the downloaded file */
  path: string;

  /** Bytes written */
  size: number;

  /** Request-scoped directory, removed when the scope ends */
  scopeDir: string;
}

export interface ExtractedText {
  text: string;
  pageCount: number;
}
