import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { getPositiveInt } from '../../shared/config/config.utils';

export const DEFAULT_CHUNK_SIZE = 10_000;

/**
 * Split text into contiguous fragments of at most `maxChars` characters.
 *
 * The split is a plain character count with no sentence or paragraph
 * awareness. Joining the fragments gives back the input exactly; empty input
 * gives no fragments.
 */
export function chunkText(
  text: string,
  maxChars: number = DEFAULT_CHUNK_SIZE,
): string[] {
  if (!Number.isInteger(maxChars) || maxChars < 1) {
    throw new RangeError(
      `maxChars must be a positive integer, received ${maxChars}`,
    );
  }

  const chunks: string[] = [];
  for (let start = 0; start < text.length; start += maxChars) {
    chunks.push(text.slice(start, start + maxChars));
  }
  return chunks;
}

/**
 * Text Chunker Service
 * Applies the configured fragment size (SUMMARY_CHUNK_SIZE)
 */
@Injectable()
export class TextChunkerService {
  private readonly logger = new Logger(TextChunkerService.name);
  private readonly maxChars: number;

  constructor(private readonly configService: ConfigService) {
    this.maxChars = getPositiveInt(
      this.configService,
      'SUMMARY_CHUNK_SIZE',
      DEFAULT_CHUNK_SIZE,
    );

    this.logger.log(`Text chunker initialized: maxChars=${this.maxChars}`);
  }

  split(text: string, maxChars: number = this.maxChars): string[] {
    const chunks = chunkText(text, maxChars);

    this.logger.log(
      `Split ${text.length} characters into ${chunks.length} fragments (maxChars=${maxChars})`,
    );

    return chunks;
  }

  getMaxChars(): number {
    return this.maxChars;
  }
}
