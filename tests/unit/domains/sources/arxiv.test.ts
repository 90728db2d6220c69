/**
 * Unit tests for the arXiv adapter
 */

import { describe, test, expect } from '@jest/globals';
import { ArxivAdapter } from '@/domains/sources/adapters/arxiv.js';
import { ConfigFactory } from '@/shared/config/config-factory.js';
import type { PdfTextExtractor } from '@/domains/sources/services/pdf-reader.js';
import type { HttpResponse } from '@/shared/http/client.js';
import { bytesResponse, createFakeFetch, SAMPLE_ATOM_FEED, textResponse } from '../../../helpers/test-utils.js';

const FEED = SAMPLE_ATOM_FEED;
const sourcesConfig = ConfigFactory.createTestConfig().sources;
const fullTextConfig = { ...sourcesConfig, arxivFullText: true };
const PDF_URL = 'http://arxiv.org/pdf/2405.01234v1';

function feedWithPdf(pdf: () => HttpResponse) {
  return createFakeFetch((url) => (url === PDF_URL ? pdf() : textResponse(FEED)));
}

function recordingExtractor(text: string): { readPdf: PdfTextExtractor; inputs: number[][] } {
  const inputs: number[][] = [];
  const readPdf: PdfTextExtractor = async (data) => {
    inputs.push(Array.from(data));
    return text;
  };
  return { readPdf, inputs };
}

describe('ArxivAdapter', () => {
  test('should query the Atom API newest first', async () => {
    const { fetch, requests } = createFakeFetch(() => textResponse(FEED));
    const adapter = new ArxivAdapter(sourcesConfig, fetch);

    await adapter.fetch('graph transformers', 7);

    expect(requests).toHaveLength(1);
    const url = new URL(requests[0]?.url ?? '');
    expect(url.origin + url.pathname).toBe('http://arxiv.test/api/query');
    expect(url.searchParams.get('search_query')).toBe('all:graph transformers');
    expect(url.searchParams.get('start')).toBe('0');
    expect(url.searchParams.get('max_results')).toBe('7');
    expect(url.searchParams.get('sortBy')).toBe('submittedDate');
    expect(url.searchParams.get('sortOrder')).toBe('descending');
    expect(requests[0]?.init).toEqual({ timeout: 1000 });
  });

  test('should map entries to documents and skip malformed ones', async () => {
    const { fetch } = createFakeFetch(() => textResponse(FEED));
    const adapter = new ArxivAdapter(sourcesConfig, fetch);

    const documents = await adapter.fetch('graph', 10);

    expect(documents).toHaveLength(2);
    expect(documents[0]).toEqual({
      content: 'We study sparse attention over large graphs.',
      metadata: {
        sourceId: 'arxiv',
        sourceName: 'ArXiv',
        title: 'Sparse Graph Transformers at Scale',
        publishedDate: '2024-05-02',
        url: 'http://arxiv.org/abs/2405.01234v1',
        extra: {
          arxivId: '2405.01234v1',
          authors: ['Ada Example', 'Bo Sample'],
          pdfUrl: 'http://arxiv.org/pdf/2405.01234v1',
          primaryCategory: 'cs.LG',
        },
      },
    });
    expect(documents[1]?.metadata.title).toBe('Robot Planning with Graph Search');
    expect(documents[1]?.metadata.extra).toEqual({
      arxivId: '2405.05678v2',
      authors: ['Cy Placeholder'],
      pdfUrl: undefined,
      primaryCategory: undefined,
    });
  });

  test('should cap results at the requested limit', async () => {
    const { fetch } = createFakeFetch(() => textResponse(FEED));
    const documents = await new ArxivAdapter(sourcesConfig, fetch).fetch('graph', 1);

    expect(documents.map((doc) => doc.metadata.url)).toEqual(['http://arxiv.org/abs/2405.01234v1']);
  });

  test('should not call the API for a zero limit or blank query', async () => {
    const { fetch, requests } = createFakeFetch(() => textResponse(FEED));
    const adapter = new ArxivAdapter(sourcesConfig, fetch);

    expect(await adapter.fetch('graph', 0)).toEqual([]);
    expect(await adapter.fetch('   ', 5)).toEqual([]);
    expect(requests).toHaveLength(0);
  });

  test('should return nothing when the API fails', async () => {
    const failing = createFakeFetch(() => textResponse('unavailable', 503, 'Service Unavailable'));
    const unreachable = createFakeFetch(() => {
      throw new Error('ECONNREFUSED');
    });

    expect(await new ArxivAdapter(sourcesConfig, failing.fetch).fetch('graph', 5)).toEqual([]);
    expect(await new ArxivAdapter(sourcesConfig, unreachable.fetch).fetch('graph', 5)).toEqual([]);
  });

  test('should treat an empty feed as no results', () => {
    const adapter = new ArxivAdapter(sourcesConfig);
    expect(adapter.parseFeed('<feed xmlns="http://www.w3.org/2005/Atom"><title>empty</title></feed>')).toEqual([]);
  });

  describe('full text', () => {
    test('should replace the abstract with the PDF text', async () => {
      const { fetch, requests } = feedWithPdf(() => bytesResponse(new Uint8Array([37, 80, 68, 70])));
      const { readPdf, inputs } = recordingExtractor('  Full   paper text\n about graphs. ');
      const adapter = new ArxivAdapter(fullTextConfig, fetch, readPdf);

      const documents = await adapter.fetch('graph', 10);

      expect(requests.map((request) => request.url)).toEqual([expect.stringContaining('http://arxiv.test/api/query'), PDF_URL]);
      expect(requests[1]?.init).toEqual({ timeout: 1000 });
      expect(inputs).toEqual([[37, 80, 68, 70]]);
      expect(documents[0]?.content).toBe('Full paper text about graphs.');
      expect(documents[0]?.metadata.extra['fullText']).toBe(true);
      // no PDF link on the second entry
      expect(documents[1]?.content).toBe('A planner for mobile robots.');
      expect(documents[1]?.metadata.extra['fullText']).toBeUndefined();
    });

    test('should cut the text at the configured length', async () => {
      const { fetch } = feedWithPdf(() => bytesResponse(new Uint8Array([1])));
      const { readPdf } = recordingExtractor('Full paper text about graphs.');
      const adapter = new ArxivAdapter({ ...fullTextConfig, arxivFullTextMaxChars: 10 }, fetch, readPdf);

      const [first] = await adapter.fetch('graph', 1);

      expect(first?.content).toBe('Full paper');
    });

    test('should keep the abstract when the download fails', async () => {
      const { fetch } = feedWithPdf(() => textResponse('missing', 404, 'Not Found'));
      const { readPdf, inputs } = recordingExtractor('never used');

      const [first] = await new ArxivAdapter(fullTextConfig, fetch, readPdf).fetch('graph', 1);

      expect(inputs).toHaveLength(0);
      expect(first?.content).toBe('We study sparse attention over large graphs.');
      expect(first?.metadata.extra['fullText']).toBeUndefined();
    });

    test('should keep the abstract when the PDF cannot be read', async () => {
      const { fetch } = feedWithPdf(() => bytesResponse(new Uint8Array([0])));
      const failing: PdfTextExtractor = async () => {
        throw new Error('Invalid PDF structure');
      };
      const empty = recordingExtractor('   ');

      const [unreadable] = await new ArxivAdapter(fullTextConfig, fetch, failing).fetch('graph', 1);
      const [blank] = await new ArxivAdapter(fullTextConfig, fetch, empty.readPdf).fetch('graph', 1);

      expect(unreadable?.content).toBe('We study sparse attention over large graphs.');
      expect(blank?.content).toBe('We study sparse attention over large graphs.');
    });

    test('should not download PDFs when full text is off', async () => {
      const { fetch, requests } = feedWithPdf(() => bytesResponse(new Uint8Array([1])));
      const { readPdf, inputs } = recordingExtractor('unused');

      await new ArxivAdapter(sourcesConfig, fetch, readPdf).fetch('graph', 10);

      expect(requests).toHaveLength(1);
      expect(inputs).toHaveLength(0);
    });
  });
});
