/**
 * Document Retriever Service
 *
 * Downloads a remote file into a request-scoped temporary directory.
 * The directory is removed when the caller's task ends, whatever the outcome.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios, { AxiosError, type AxiosInstance } from 'axios';
import { createWriteStream, promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { v4 as uuidv4 } from 'uuid';
import { getPositiveInt } from '../../shared/config/config.utils';
import { DEFAULT_DOCUMENT_FILENAME } from '../constants/document-mime-types';
import {
  DownloadHttpError,
  DownloadNetworkError,
  DownloadTimeoutError,
  RetrievalError,
  TempStorageError,
} from '../errors/retrieval-errors';
import type { DownloadSource, DownloadedFile } from '../types';

const TIMEOUT_ERROR_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT', 'ERR_CANCELED']);

@Injectable()
export class DocumentRetrieverService {
  private readonly logger = new Logger(DocumentRetrieverService.name);
  private readonly client: AxiosInstance;
  private readonly timeoutMs: number;
  private readonly tempDir: string;

  constructor(private readonly configService: ConfigService) {
    this.timeoutMs = getPositiveInt(
      this.configService,
      'DOWNLOAD_TIMEOUT_MS',
      60_000,
    );

    this.tempDir =
      this.configService.get<string>('DOWNLOAD_TEMP_DIR') ||
      path.join(os.tmpdir(), 'pdf-summary-bot');

    this.client = axios.create({
      timeout: this.timeoutMs,
      maxRedirects: 5,
    });

    this.logger.log(
      `Document retriever initialized - Timeout: ${this.timeoutMs}ms, Temp Dir: ${this.tempDir}`,
    );
  }

  /**
   * Download `source` into a fresh scope, run `task` on it, then remove the
   * scope on every exit path.
   * @throws RetrievalError if the download fails
   */
  async withDownloadedFile<T>(
    source: DownloadSource,
    task: (file: DownloadedFile) => Promise<T>,
  ): Promise<T> {
    const scopeDir = await this.createScope();

    try {
      const filePath = path.join(scopeDir, this.toSafeFileName(source.fileName));
      const size = await this.download(source.url, filePath);

      return await task({ path: filePath, size, scopeDir });
    } finally {
      await this.releaseScope(scopeDir);
    }
  }

  /**
   * Stream the body of `url` into `destPath`
   * @returns Bytes written
   * @throws RetrievalError on non-2xx status, timeout or network failure
   */
  async download(url: string, destPath: string): Promise<number> {
    const startTime = Date.now();
    const signal = AbortSignal.timeout(this.timeoutMs);

    let body: Readable;
    try {
      const response = await this.client.get<Readable>(url, {
        responseType: 'stream',
        signal,
      });
      body = response.data;
    } catch (error) {
      throw this.toRetrievalError(error);
    }

    let bytesReceived = 0;
    body.on('data', (chunk: Buffer) => {
      bytesReceived += chunk.length;
    });

    try {
      await pipeline(body, createWriteStream(destPath), { signal });
    } catch (error) {
      throw this.toRetrievalError(error);
    }

    this.logger.log(
      `Downloaded ${bytesReceived} bytes to ${path.basename(destPath)} in ${Date.now() - startTime}ms`,
    );

    return bytesReceived;
  }

  getTempDir(): string {
    return this.tempDir;
  }

  private async createScope(): Promise<string> {
    const scopeDir = path.join(this.tempDir, uuidv4());

    try {
      await fs.mkdir(scopeDir, { recursive: true });
    } catch (error) {
      this.logger.error(
        `Failed to create temp directory: ${scopeDir}`,
        error instanceof Error ? error.stack : String(error),
      );
      throw new TempStorageError(
        scopeDir,
        error instanceof Error ? error : undefined,
      );
    }

    return scopeDir;
  }

  private async releaseScope(scopeDir: string): Promise<void> {
    try {
      await fs.rm(scopeDir, { recursive: true, force: true });
      this.logger.debug(`Cleaned up temp directory: ${scopeDir}`);
    } catch (error) {
      // Never mask the task's own outcome
      this.logger.warn(
        `Failed to cleanup temp directory: ${scopeDir}`,
        error instanceof Error ? error.message : String(error),
      );
    }
  }

  private toSafeFileName(fileName: string | undefined): string {
    const baseName = fileName ? path.basename(fileName).trim() : '';
    if (!baseName || baseName === '.' || baseName === '..') {
      return DEFAULT_DOCUMENT_FILENAME;
    }
    return baseName;
  }

  private toRetrievalError(error: unknown): RetrievalError {
    if (error instanceof RetrievalError) {
      return error;
    }

    if (error instanceof AxiosError) {
      const status = error.response?.status;
      const body: unknown = error.response?.data;
      if (body instanceof Readable) {
        body.destroy();
      }

      if (status !== undefined) {
        return new DownloadHttpError(status, error);
      }
      if (error.code && TIMEOUT_ERROR_CODES.has(error.code)) {
        return new DownloadTimeoutError(this.timeoutMs, error);
      }
      return new DownloadNetworkError(error.message, error);
    }

    if (
      error instanceof Error &&
      (error.name === 'AbortError' || error.name === 'TimeoutError')
    ) {
      return new DownloadTimeoutError(this.timeoutMs, error);
    }

    return new DownloadNetworkError(
      error instanceof Error ? error.message : String(error),
      error instanceof Error ? error : undefined,
    );
  }
}
