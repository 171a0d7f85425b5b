/**
 * A single element in a parsed markup tree. Extraction code only talks to this
 * interface, so any tree library that can answer XPath queries can back it.
 */
export interface MarkupNode {
  /** Lower-cased element name (`#document` for the document node) */
  readonly tagName: string;
  /** Concatenated text of the whole subtree, markup stripped */
  readonly innerText: string;
  attribute(name: string): string | null;
  /** Matching nodes in document order; relative expressions use this node as context */
  query(xpath: string): MarkupNode[];
  /** Detach this node (and its subtree) from its parent */
  remove(): void;
}

export interface MarkupDocument {
  readonly root: MarkupNode | null;
}

export interface PageRecord {
  content: string;
  title?: string;
  destinationURL?: string;
  imagePreviewUrl?: string;
  /** Only set when imagePreviewUrl came from an image inside the region */
  altText?: string;
}

/** Marker attribute identifying section-level regions of a page */
export interface SectionMarker {
  attribute: string;
  values: string[];
}

export interface FieldExtractionContext {
  document: MarkupDocument;
  /** og:image / twitter:image of the whole page, empty when the page has none */
  sourcePreviewImage: string;
  index: number;
}

export type PageFieldExtractor = (region: MarkupNode, context: FieldExtractionContext) => PageRecord;

export interface ExtractPagesOptions {
  sectionMarker?: SectionMarker;
  fieldExtractor?: PageFieldExtractor;
}

export interface PageExtractor {
  extractPages(document: MarkupDocument | null | undefined, xpath?: string): PageRecord[];
  cleanRegion(document: MarkupDocument | null | undefined, xpath?: string): string | null;
}
