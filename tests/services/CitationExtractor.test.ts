import { describe, it, expect } from 'vitest';
import { extractCitations, formatCitationsMarkdown } from '../../src/services/CitationExtractor.js';

describe('extractCitations', () => {
  it('should return the answer with no citations when there are no annotations', () => {
    const result = extractCitations([{ text: 'Drink water.', annotations: [] }]);

    expect(result).toEqual({ answerText: 'Drink water.', citations: [], groundingUsed: false });
  });

  it('should read both nested and flat url_citation shapes', () => {
    const text = 'Metformin is first line【3:0†source】 per guidelines【3:1†source】.';
    const result = extractCitations([
      {
        text,
        annotations: [
          {
            type: 'url_citation',
            text: '【3:1†source】',
            url_citation: { url: 'https://b.example/guide', title: 'Guideline B' },
          },
          { type: 'url_citation', start_index: 23, url: 'https://a.example/study', title: 'Study A' },
        ],
      },
    ]);

    expect(result.groundingUsed).toBe(true);
    expect(result.citations).toEqual([
      { url: 'https://a.example/study', title: 'Study A', position: 23 },
      { url: 'https://b.example/guide', title: 'Guideline B', position: text.indexOf('【3:1†source】') },
    ]);
  });

  it('should keep one citation per url at its earliest position', () => {
    const result = extractCitations([
      {
        text: 'abcdefghijklmnop',
        annotations: [
          { type: 'url_citation', start_index: 10, url_citation: { url: 'https://a.example', title: 'Later' } },
          { type: 'url_citation', start_index: 2, url_citation: { url: 'https://a.example', title: 'Earlier' } },
        ],
      },
    ]);

    expect(result.citations).toEqual([{ url: 'https://a.example', title: 'Earlier', position: 2 }]);
  });

  it('should offset positions by the preceding blocks', () => {
    const result = extractCitations([
      { text: 'Hello ', annotations: [] },
      {
        text: 'world',
        annotations: [{ type: 'url_citation', start_index: 0, url: 'https://w.example', title: 'W' }],
      },
    ]);

    expect(result.answerText).toBe('Hello world');
    expect(result.citations[0]?.position).toBe(6);
  });

  it('should place citations without a locatable position at the end', () => {
    const result = extractCitations([
      {
        text: 'Answer.',
        annotations: [{ type: 'url_citation', url: 'https://x.example', title: 'X' }],
      },
    ]);

    expect(result.citations).toEqual([{ url: 'https://x.example', title: 'X', position: 7 }]);
  });

  it('should default a missing title', () => {
    const result = extractCitations([
      { text: 'A', annotations: [{ type: 'url_citation', start_index: 0, url: 'https://x.example' }] },
    ]);

    expect(result.citations[0]?.title).toBe('Web Source');
  });

  it('should ignore other annotation kinds and citations without a url', () => {
    const result = extractCitations([
      {
        text: 'A',
        annotations: [
          { type: 'file_citation', file_citation: { file_id: 'file_1' } },
          { type: 'url_citation', url_citation: { title: 'No url' } },
          'not an object',
          null,
        ],
      },
    ]);

    expect(result.citations).toEqual([]);
    expect(result.groundingUsed).toBe(false);
  });
});

describe('formatCitationsMarkdown', () => {
  it('should render a numbered source list', () => {
    const markdown = formatCitationsMarkdown([
      { url: 'https://a.example', title: 'Study A', position: 0 },
      { url: 'https://b.example', title: 'Guideline B', position: 5 },
    ]);

    expect(markdown).toBe(
      '### Web Sources\n1. [Study A](https://a.example)\n2. [Guideline B](https://b.example)'
    );
  });

  it('should say so when there are no sources', () => {
    expect(formatCitationsMarkdown([])).toBe('*No web sources cited*');
  });
});
