import { JSDOM } from 'jsdom';
import { MarkupDocument, MarkupNode } from '../types.js';

// XPathResult.ORDERED_NODE_SNAPSHOT_TYPE; there is no global XPathResult outside a window
const ORDERED_NODE_SNAPSHOT_TYPE = 7;
const ELEMENT_NODE = 1;

function isElement(node: Node | null): node is Element {
  return node !== null && node.nodeType === ELEMENT_NODE;
}

export class JsdomNode implements MarkupNode {
  constructor(private readonly node: Element | Document) {}

  get tagName(): string {
    return this.node.nodeName.toLowerCase();
  }

  get innerText(): string {
    if ('getAttribute' in this.node) {
      return this.node.textContent ?? '';
    }
    // Document.textContent is always null
    return this.node.documentElement?.textContent ?? '';
  }

  attribute(name: string): string | null {
    return 'getAttribute' in this.node ? this.node.getAttribute(name) : null;
  }

  query(xpath: string): MarkupNode[] {
    const owner = 'getAttribute' in this.node ? this.node.ownerDocument : this.node;
    const snapshot = owner.evaluate(xpath, this.node, null, ORDERED_NODE_SNAPSHOT_TYPE, null);

    const matches: MarkupNode[] = [];
    for (let i = 0; i < snapshot.snapshotLength; i++) {
      const item = snapshot.snapshotItem(i);
      if (isElement(item)) {
        matches.push(new JsdomNode(item));
      }
    }
    return matches;
  }

  remove(): void {
    if ('getAttribute' in this.node) {
      this.node.remove();
    }
  }
}

export class JsdomDocument implements MarkupDocument {
  readonly root: MarkupNode | null;

  constructor(readonly document: Document) {
    this.root = document.documentElement ? new JsdomNode(document) : null;
  }
}

export interface ParseHtmlOptions {
  /** Base URL of the page, used by jsdom to resolve relative URLs */
  url?: string;
}

/**
 * Parse raw HTML into a document. Scripts in the markup are never executed.
 */
export function parseHtml(html: string, options: ParseHtmlOptions = {}): JsdomDocument {
  const dom = options.url ? new JSDOM(html, { url: options.url }) : new JSDOM(html);
  return new JsdomDocument(dom.window.document);
}

/** Wrap a DOM document produced elsewhere, e.g. by a crawler */
export function fromDocument(document: Document): JsdomDocument {
  return new JsdomDocument(document);
}
