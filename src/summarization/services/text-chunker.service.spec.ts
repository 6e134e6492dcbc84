import { ConfigService } from '@nestjs/config';
import { isolateEnv } from '../../shared/testing/isolate-env';
import {
  DEFAULT_CHUNK_SIZE,
  TextChunkerService,
  chunkText,
} from './text-chunker.service';

describe('chunkText', () => {
  it('returns no fragments for empty text', () => {
    expect(chunkText('', 10)).toEqual([]);
  });

  it('splits 25,000 characters into 10,000 / 10,000 / 5,000', () => {
    const text = 'a'.repeat(10_000) + 'b'.repeat(10_000) + 'c'.repeat(5_000);

    const fragments = chunkText(text, 10_000);

    expect(fragments.map((fragment) => fragment.length)).toEqual([
      10_000, 10_000, 5_000,
    ]);
    expect(fragments[0]).toBe('a'.repeat(10_000));
    expect(fragments[2]).toBe('c'.repeat(5_000));
    expect(fragments.join('')).toBe(text);
  });

  it('returns the whole text when it fits in one fragment', () => {
    expect(chunkText('short text', 10)).toEqual(['short text']);
    expect(chunkText('short text', 500)).toEqual(['short text']);
  });

  it('cuts on exact multiples without a trailing empty fragment', () => {
    expect(chunkText('abcdef', 2)).toEqual(['ab', 'cd', 'ef']);
  });

  it('keeps every fragment within the limit and loses nothing', () => {
    const text = 'The quick brown fox jumps over the lazy dog. '.repeat(37);

    for (const maxChars of [1, 7, 44, 45, 100, text.length]) {
      const fragments = chunkText(text, maxChars);

      expect(fragments.join('')).toBe(text);
      expect(fragments.every((f) => f.length > 0 && f.length <= maxChars)).toBe(
        true,
      );
      expect(fragments).toHaveLength(Math.ceil(text.length / maxChars));
    }
  });

  it('cuts mid-sentence rather than at sentence boundaries', () => {
    expect(chunkText('One. Two.', 6)).toEqual(['One. T', 'wo.']);
  });

  it('defaults to 10,000 characters', () => {
    expect(DEFAULT_CHUNK_SIZE).toBe(10_000);
    expect(chunkText('x'.repeat(10_001))).toHaveLength(2);
  });

  it.each([0, -5, 2.5, Number.NaN])('rejects maxChars=%p', (maxChars) => {
    expect(() => chunkText('abc', maxChars)).toThrow(RangeError);
  });
});

describe('TextChunkerService', () => {
  isolateEnv(['SUMMARY_CHUNK_SIZE']);

  it('uses SUMMARY_CHUNK_SIZE', () => {
    const service = new TextChunkerService(
      new ConfigService({ SUMMARY_CHUNK_SIZE: '4' }),
    );

    expect(service.getMaxChars()).toBe(4);
    expect(service.split('abcdefghij')).toEqual(['abcd', 'efgh', 'ij']);
  });

  it('lets callers override the size per call', () => {
    const service = new TextChunkerService(
      new ConfigService({ SUMMARY_CHUNK_SIZE: '4' }),
    );

    expect(service.split('abcdefghij', 5)).toEqual(['abcde', 'fghij']);
  });

  it.each(['not-a-number', '0', '-3', ''])(
    'falls back to the default for SUMMARY_CHUNK_SIZE=%p',
    (value) => {
      const service = new TextChunkerService(
        new ConfigService({ SUMMARY_CHUNK_SIZE: value }),
      );

      expect(service.getMaxChars()).toBe(DEFAULT_CHUNK_SIZE);
    },
  );
});
