/**
 * Mock detection provider for testing.
 * Returns canned candidate spans. Spans can be given as fixed offsets or
 * located by substring, so tests don't have to count characters.
 */

import type { IEntityDetectionProvider } from '../../src/providers/IEntityDetectionProvider.js';
import type { DomainFilter, RawEntity } from '../../src/types/models.js';

export interface CannedSpan {
  category: string;
  /** Substring of the analysed text; its first occurrence becomes the span. */
  match: string;
  score: number;
  subcategory?: string;
}

export class MockDetectionProvider implements IEntityDetectionProvider {
  public callCount = 0;
  public lastText: string | null = null;
  public lastDomain: DomainFilter | null = null;
  public lastLanguage: string | null = null;

  private spans: CannedSpan[] = [];
  private raw: RawEntity[] | null = null;
  private failure: Error | null = null;

  async detect(text: string, domainFilter: DomainFilter, language: string): Promise<RawEntity[]> {
    this.callCount++;
    this.lastText = text;
    this.lastDomain = domainFilter;
    this.lastLanguage = language;

    if (this.failure) throw this.failure;
    if (this.raw) return this.raw;

    return this.spans.map((span) => {
      const offset = text.indexOf(span.match);
      if (offset < 0) throw new Error(`Canned span "${span.match}" not found in text`);
      return {
        category: span.category,
        ...(span.subcategory !== undefined && { subcategory: span.subcategory }),
        text: span.match,
        offset,
        length: span.match.length,
        confidenceScore: span.score,
      };
    });
  }

  // ── Test Helpers ──

  willReturn(...spans: CannedSpan[]): this {
    this.spans = spans;
    this.raw = null;
    return this;
  }

  /** Return these entities verbatim, offsets and all. */
  willReturnRaw(...entities: RawEntity[]): this {
    this.raw = entities;
    return this;
  }

  willFail(err: Error): this {
    this.failure = err;
    return this;
  }
}
