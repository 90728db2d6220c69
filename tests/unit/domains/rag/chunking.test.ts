/**
 * Unit tests for fragment splitting
 */

import { describe, test, expect } from '@jest/globals';
import { ChunkingService, splitDocuments, splitFixed } from '@/domains/rag/services/chunking.js';
import { enrichDocuments } from '@/domains/rag/services/enricher.js';
import { ErrorCode, StructuredError } from '@/shared/errors/index.js';
import { createRawDocument } from '../../../helpers/test-utils.js';

function digits(length: number): string {
  return Array.from({ length }, (_, i) => String(i % 10)).join('');
}

function letters(length: number): string {
  return Array.from({ length }, (_, i) => 'abcdefghij'.charAt(i % 10)).join('');
}

describe('splitFixed', () => {
  test('should cut overlapping windows until the end is reached', () => {
    const text = digits(2500);
    const windows = splitFixed(text, 1000, 100);

    expect(windows.map((w) => w.length)).toEqual([1000, 1000, 700]);
    expect(windows[0]).toBe(text.slice(0, 1000));
    expect(windows[1]).toBe(text.slice(900, 1900));
    expect(windows[2]).toBe(text.slice(1800, 2500));
    // Consecutive windows share exactly the overlap
    expect(windows[0]?.slice(-100)).toBe(windows[1]?.slice(0, 100));
  });

  test('should return a single window for short text', () => {
    expect(splitFixed('short text', 1000, 100)).toEqual(['short text']);
  });

  test('should not emit a trailing window contained in the previous one', () => {
    expect(splitFixed('abcdefgh', 4, 2)).toEqual(['abcd', 'cdef', 'efgh']);
  });

  test('should return nothing for empty text', () => {
    expect(splitFixed('', 10, 2)).toEqual([]);
  });

  test('should reject an overlap that is not below the size', () => {
    expect(() => splitFixed('abc', 10, 10)).toThrow(StructuredError);
    expect(() => splitFixed('abc', 10, -1)).toThrow(StructuredError);
    expect(() => splitFixed('abc', 0, 0)).toThrow(StructuredError);
  });
});

describe('ChunkingService', () => {
  test('should validate options on construction', () => {
    let caught: unknown;
    try {
      new ChunkingService({ chunkSize: 100, chunkOverlap: 150 });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(StructuredError);
    if (caught instanceof StructuredError) {
      expect(caught.code).toBe(ErrorCode.VALIDATION_ERROR);
    }
  });

  test('should number fragments per document and inherit metadata', async () => {
    const docs = [
      createRawDocument({ content: digits(25), title: 'Long' }),
      createRawDocument({ content: 'tiny', title: 'Short' }),
      createRawDocument({ content: '', title: 'Empty' }),
    ];

    const fragments = await new ChunkingService({ chunkSize: 10, chunkOverlap: 2 }).split(docs);

    expect(fragments.map((f) => [f.metadata.title, f.metadata.fragmentIndex, f.text])).toEqual([
      ['Long', 0, '0123456789'],
      ['Long', 1, '8901234567'],
      ['Long', 2, '678901234'],
      ['Short', 0, 'tiny'],
    ]);
    expect(fragments[0]?.metadata.url).toBe('http://arxiv.org/abs/2405.00001v1');
  });

  test('should split on boundaries with the recursive strategy', async () => {
    const text = 'First sentence here. Second sentence here. Third sentence here.';
    const fragments = await new ChunkingService({ chunkSize: 25, chunkOverlap: 0, strategy: 'recursive' }).splitText(
      text
    );

    expect(fragments.length).toBeGreaterThan(1);
    for (const fragment of fragments) {
      expect(fragment.length).toBeLessThanOrEqual(25);
    }
  });

  test('should expose a one-shot helper', async () => {
    const fragments = await splitDocuments([createRawDocument({ content: 'abcdefgh' })], 4, 2);
    expect(fragments.map((f) => f.text)).toEqual(['abcd', 'cdef', 'efgh']);
  });
});

describe('ChunkingService over enriched papers', () => {
  test('should cut two 2500-character papers into three overlapping fragments each', async () => {
    const docs = enrichDocuments([
      createRawDocument({ content: digits(2500) }),
      createRawDocument({ title: 'Second Paper', url: 'http://arxiv.org/abs/2405.00002v1', content: letters(2500) }),
    ]);
    // 100 header characters ahead of each summary
    expect(docs.map((doc) => doc.content.length)).toEqual([2600, 2600]);

    const fragments = await new ChunkingService({ chunkSize: 1000, chunkOverlap: 100 }).split(docs);

    expect(fragments).toHaveLength(6);
    expect(fragments.map((f) => [f.metadata.title, f.metadata.fragmentIndex, f.text.length])).toEqual([
      ['A Test Paper', 0, 1000],
      ['A Test Paper', 1, 1000],
      ['A Test Paper', 2, 800],
      ['Second Paper', 0, 1000],
      ['Second Paper', 1, 1000],
      ['Second Paper', 2, 800],
    ]);

    fragments.forEach((fragment, i) => {
      const parent = docs[i < 3 ? 0 : 1]?.content ?? '';
      const start = fragment.metadata.fragmentIndex * 900;
      expect(fragment.text).toBe(parent.slice(start, start + 1000));
    });

    for (const [previous, next] of [
      [fragments[0], fragments[1]],
      [fragments[1], fragments[2]],
      [fragments[3], fragments[4]],
      [fragments[4], fragments[5]],
    ]) {
      expect(previous?.text.slice(-100)).toBe(next?.text.slice(0, 100));
    }

    expect(fragments[0]?.text.startsWith('SOURCE: ArXiv\nTITLE: A Test Paper\nDATE: 2024-05-01\n')).toBe(true);
    expect(fragments[3]?.text.startsWith('SOURCE: ArXiv\nTITLE: Second Paper\n')).toBe(true);
  });
});
