import { innerTextOfFirst, selectNodes } from '../dom/query.js';
import { MarkupDocument } from '../types.js';
import { logger } from '../util/logger.js';

const LINE_BREAK_RUNS = /(\r\n|\n)+/g;
const HORIZONTAL_SPACE_RUNS = /[ \t]+/g;

/** Elements that never hold indexable text */
export const NON_CONTENT_TAGS = ['script', 'style', 'svg', 'path'] as const;

/**
 * Collapse runs of line breaks to a single `\n`, then runs of spaces and tabs
 * to a single space. A lone `\r` is not treated as a line break.
 *
 * Idempotent except where a lone `\r` directly precedes a `\n`: `'a\r\r\nb'`
 * becomes `'a\r\nb'`, which a second pass turns into `'a\nb'`.
 */
export function normalizeWhitespace(text: string | null | undefined): string | null {
  if (text === null || text === undefined) {
    return null;
  }

  return text.replace(LINE_BREAK_RUNS, '\n').replace(HORIZONTAL_SPACE_RUNS, ' ');
}

/** Union expression matching any of the given element names anywhere in the document */
export function nodeTypeXPath(tagNames: readonly string[]): string {
  return tagNames.map((tag) => `//${tag.toLowerCase()}`).join(' | ');
}

/**
 * Remove every node matching the expression from the document.
 * @returns Number of nodes removed
 */
export function removeNodes(document: MarkupDocument, xpath: string): number {
  const nodes = selectNodes(document.root, xpath);
  logger.debug(`[TextNormalizer] Removing ${nodes.length} nodes matching ${xpath}`);
  for (const node of nodes) {
    node.remove();
  }
  return nodes.length;
}

export function removeNodesOfType(document: MarkupDocument, ...tagNames: string[]): void {
  if (tagNames.length === 0) {
    return;
  }
  removeNodes(document, nodeTypeXPath(tagNames));
}

/**
 * Destructive: deletes script, style and vector graphics elements from the
 * whole document in place.
 */
export function stripNonContentNodes(document: MarkupDocument): void {
  removeNodesOfType(document, ...NON_CONTENT_TAGS);
}

/**
 * Strip non-content nodes from the document, then return the normalized text
 * of the first node matching `xpath`. The removal affects the entire document,
 * not only the selected region.
 */
export function cleanRegion(document: MarkupDocument | null | undefined, xpath: string): string | null {
  if (!document?.root) {
    return null;
  }

  stripNonContentNodes(document);
  return normalizeWhitespace(innerTextOfFirst(document, xpath));
}
