import { MarkupDocument, MarkupNode } from '../types.js';

export function selectNodes(node: MarkupNode | null | undefined, xpath: string): MarkupNode[] {
  return node ? node.query(xpath) : [];
}

export function selectFirst(node: MarkupNode | null | undefined, xpath: string): MarkupNode | null {
  return selectNodes(node, xpath)[0] ?? null;
}

/**
 * Inner text of the first node matching the expression, or null when nothing matches.
 */
export function innerTextOfFirst(document: MarkupDocument | null | undefined, xpath: string): string | null {
  return selectFirst(document?.root, xpath)?.innerText ?? null;
}
