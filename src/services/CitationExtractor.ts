/**
 * Citation extraction from an agent answer.
 * Reads URL citation annotations off the answer's text blocks, orders them by
 * where they first appear in the answer and keeps one entry per URL.
 *
 * Two annotation shapes are accepted:
 *   { type: 'url_citation', url_citation: { url, title }, start_index?, text? }
 *   { type: 'url_citation', url, title, start_index? }
 * Anything else (file citations, unknown kinds) is ignored.
 */

import type { AgentTextBlock } from '../providers/IAgentProvider.js';
import type { Citation } from '../types/models.js';

const DEFAULT_TITLE = 'Web Source';

export interface ExtractedAnswer {
  answerText: string;
  citations: Citation[];
  groundingUsed: boolean;
}

interface UrlReference {
  url: string;
  title: string;
  startIndex: number | null;
  marker: string | null;
}

export function extractCitations(blocks: readonly AgentTextBlock[]): ExtractedAnswer {
  const answerText = blocks.map((b) => b.text).join('');
  const found: Citation[] = [];

  let blockOffset = 0;
  for (const block of blocks) {
    for (const annotation of block.annotations) {
      const ref = readUrlReference(annotation);
      if (!ref) continue;
      found.push({
        url: ref.url,
        title: ref.title,
        position: positionOf(ref, block.text, blockOffset, answerText.length),
      });
    }
    blockOffset += block.text.length;
  }

  found.sort((a, b) => a.position - b.position);

  const seen = new Set<string>();
  const citations = found.filter((c) => {
    if (seen.has(c.url)) return false;
    seen.add(c.url);
    return true;
  });

  return { answerText, citations, groundingUsed: citations.length > 0 };
}

/** Numbered markdown source list for display. */
export function formatCitationsMarkdown(citations: readonly Citation[]): string {
  if (citations.length === 0) return '*No web sources cited*';

  const lines = ['### Web Sources'];
  citations.forEach((c, i) => {
    lines.push(`${i + 1}. [${c.title}](${c.url})`);
  });
  return lines.join('\n');
}

// ── Private ──

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readUrlReference(annotation: unknown): UrlReference | null {
  if (!isRecord(annotation) || annotation.type !== 'url_citation') return null;

  const source = isRecord(annotation.url_citation) ? annotation.url_citation : annotation;
  const { url, title } = source;
  if (typeof url !== 'string' || url.length === 0) return null;

  const startIndex = annotation.start_index;
  return {
    url,
    title: typeof title === 'string' && title.trim().length > 0 ? title : DEFAULT_TITLE,
    startIndex: typeof startIndex === 'number' && Number.isInteger(startIndex) && startIndex >= 0
      ? startIndex
      : null,
    marker: typeof annotation.text === 'string' && annotation.text.length > 0 ? annotation.text : null,
  };
}

function positionOf(ref: UrlReference, blockText: string, blockOffset: number, answerLength: number): number {
  if (ref.startIndex !== null && ref.startIndex <= blockText.length) {
    return blockOffset + ref.startIndex;
  }
  if (ref.marker !== null) {
    const at = blockText.indexOf(ref.marker);
    if (at >= 0) return blockOffset + at;
  }
  return answerLength;
}
