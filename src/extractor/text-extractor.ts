import { selectNodes } from '../dom/query.js';
import {
  FieldExtractionContext,
  MarkupDocument,
  MarkupNode,
  PageExtractor,
  PageFieldExtractor,
  PageRecord,
  SectionMarker,
} from '../types.js';
import { DEFAULT_SECTION_MARKER, defaultFieldExtractor, extractPages } from './segmenter.js';
import { NON_CONTENT_TAGS, nodeTypeXPath, normalizeWhitespace, removeNodes } from './text-normalizer.js';

export const DEFAULT_FALLBACK_XPATH = '//body';

export interface TextExtractorOptions {
  fallbackXPath?: string;
  sectionMarker?: SectionMarker;
  fieldExtractor?: PageFieldExtractor;
}

/**
 * Extracts page records and cleaned text from a document.
 *
 * Field derivation can be customized either by passing a `fieldExtractor`
 * or by subclassing and overriding the protected helpers; cleanRegion goes
 * through removeNodesOfType, extractTextFromFirstMatchingElement and
 * normalizeWhitespace, so overriding any of them changes its output.
 */
export class TextExtractor implements PageExtractor {
  readonly fallbackXPath: string;
  protected readonly sectionMarker: SectionMarker;
  protected readonly fieldExtractor: PageFieldExtractor;

  constructor(options: TextExtractorOptions = {}) {
    this.fallbackXPath = options.fallbackXPath ?? DEFAULT_FALLBACK_XPATH;
    this.sectionMarker = options.sectionMarker ?? DEFAULT_SECTION_MARKER;
    this.fieldExtractor = options.fieldExtractor ?? defaultFieldExtractor;
  }

  extractPages(document: MarkupDocument | null | undefined, xpath: string = this.fallbackXPath): PageRecord[] {
    return extractPages(document, xpath, {
      sectionMarker: this.sectionMarker,
      fieldExtractor: (region, context) => this.extractFields(region, context),
    });
  }

  /**
   * Destructive: strips script, style, svg and path elements from the whole
   * document before reading the region text.
   */
  cleanRegion(document: MarkupDocument | null | undefined, xpath: string = this.fallbackXPath): string | null {
    if (!document?.root) {
      return null;
    }

    this.removeNodesOfType(document, ...NON_CONTENT_TAGS);
    return this.normalizeWhitespace(this.extractTextFromFirstMatchingElement(document, xpath));
  }

  protected extractFields(region: MarkupNode, context: FieldExtractionContext): PageRecord {
    return this.fieldExtractor(region, context);
  }

  protected normalizeWhitespace(text: string | null): string | null {
    return normalizeWhitespace(text);
  }

  protected removeNodesOfType(document: MarkupDocument, ...tagNames: string[]): void {
    if (tagNames.length > 0) {
      this.removeNodes(document, nodeTypeXPath(tagNames));
    }
  }

  protected removeNodes(document: MarkupDocument, xpath: string): number {
    return removeNodes(document, xpath);
  }

  /** Inner text of the first element matching the expression, or null if none match */
  protected extractTextFromFirstMatchingElement(document: MarkupDocument, xpath: string): string | null {
    return this.safeSelectNodes(document, xpath)[0]?.innerText ?? null;
  }

  protected safeSelectNodes(document: MarkupDocument, xpath: string): MarkupNode[] {
    return selectNodes(document.root, xpath);
  }
}
