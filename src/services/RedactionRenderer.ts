/**
 * Redaction renderer.
 * Rewrites text against the immutable original offsets in a single pass, so
 * placeholder lengths never shift the spans still to be processed.
 *
 * Expects a ResolvedEntitySet (sorted, disjoint).
 */

import type { EntityCategory, ResolvedEntitySet } from '../types/models.js';

export function placeholderFor(category: EntityCategory): string {
  return `[${category.toUpperCase()}]`;
}

export function renderRedaction(originalText: string, entities: ResolvedEntitySet): string {
  return assemble(originalText, entities, (entity) => placeholderFor(entity.category));
}

/** Display form: each entity shown as `**[text](Category)**`. */
export function highlightEntities(originalText: string, entities: ResolvedEntitySet): string {
  return assemble(originalText, entities, (entity, spanText) => `**[${spanText}](${entity.category})**`);
}

function assemble(
  originalText: string,
  entities: ResolvedEntitySet,
  replace: (entity: ResolvedEntitySet[number], spanText: string) => string
): string {
  if (entities.length === 0) return originalText;

  const parts: string[] = [];
  let cursor = 0;

  for (const entity of entities) {
    const end = entity.startOffset + entity.length;
    parts.push(originalText.slice(cursor, entity.startOffset));
    parts.push(replace(entity, originalText.slice(entity.startOffset, end)));
    cursor = end;
  }
  parts.push(originalText.slice(cursor));

  return parts.join('');
}
