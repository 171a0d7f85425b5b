import { selectFirst, selectNodes } from '../dom/query.js';
import {
  ExtractPagesOptions,
  FieldExtractionContext,
  MarkupDocument,
  MarkupNode,
  PageFieldExtractor,
  PageRecord,
  SectionMarker,
} from '../types.js';
import { logger } from '../util/logger.js';

export const DEFAULT_SECTION_MARKER: SectionMarker = {
  attribute: 'ocr-component-name',
  values: ['section-master', 'interactive-demo'],
};

const OPEN_GRAPH_IMAGE_XPATH = "//meta[@property='og:image']";
const TWITTER_IMAGE_XPATH = "//meta[@name='twitter:image']";

// Same-page links only, see https://developer.mozilla.org/en-US/docs/Web/HTML/Element/a#linking_to_an_element_on_the_same_page
const FRAGMENT_ANCHOR_XPATH = ".//a[starts-with(@href, '#')]";

function xpathLiteral(value: string): string {
  if (!value.includes("'")) {
    return `'${value}'`;
  }
  if (!value.includes('"')) {
    return `"${value}"`;
  }
  const parts = value.split("'").map((part) => `'${part}'`);
  return `concat(${parts.join(`, "'", `)})`;
}

/**
 * Expression selecting every `div` whose marker attribute holds one of the
 * marker values, or null when there are no values to match.
 */
export function sectionXPath(marker: SectionMarker): string | null {
  if (marker.values.length === 0) {
    return null;
  }
  const predicate = marker.values.map((value) => `@${marker.attribute}=${xpathLiteral(value)}`).join(' or ');
  return `//div[${predicate}]`;
}

/**
 * Page-level preview image: og:image, else twitter:image. Empty string when the
 * page declares neither.
 */
export function findSourcePreviewImage(document: MarkupDocument): string {
  const meta = selectFirst(document.root, OPEN_GRAPH_IMAGE_XPATH) ?? selectFirst(document.root, TWITTER_IMAGE_XPATH);
  return meta?.attribute('content') ?? '';
}

/**
 * Marked section regions, or the fallback selection when the page has none.
 * The two sets are never combined.
 */
export function findRegions(
  document: MarkupDocument,
  fallbackSelector: string,
  marker: SectionMarker = DEFAULT_SECTION_MARKER
): MarkupNode[] {
  const primary = sectionXPath(marker);
  const sections = primary ? selectNodes(document.root, primary) : [];
  if (sections.length > 0) {
    return sections;
  }

  logger.debug(`[Segmenter] No marked sections found, falling back to ${fallbackSelector}`);
  return selectNodes(document.root, fallbackSelector);
}

export const defaultFieldExtractor: PageFieldExtractor = (
  region: MarkupNode,
  context: FieldExtractionContext
): PageRecord => {
  const page: PageRecord = { content: region.innerText };

  const heading = selectFirst(region, './/h1') ?? selectFirst(region, './/h2');
  if (heading) {
    page.title = heading.innerText;
  }

  const anchor = selectFirst(region, FRAGMENT_ANCHOR_XPATH);
  if (anchor) {
    page.destinationURL = anchor.attribute('href') ?? '';
  }

  const image = selectFirst(region, './/img');
  if (image) {
    page.imagePreviewUrl = image.attribute('src') ?? '';
    page.altText = image.attribute('alt') ?? '';
  } else if (context.sourcePreviewImage) {
    page.imagePreviewUrl = context.sourcePreviewImage;
  }

  return page;
};

/**
 * Split a document into page records, one per region, in document order.
 * `content` is the raw inner text of the region; use cleanRegion for
 * normalized text.
 */
export function extractPages(
  document: MarkupDocument | null | undefined,
  fallbackSelector: string,
  options: ExtractPagesOptions = {}
): PageRecord[] {
  if (!document?.root) {
    return [];
  }

  const fieldExtractor = options.fieldExtractor ?? defaultFieldExtractor;
  const sourcePreviewImage = findSourcePreviewImage(document);
  const regions = findRegions(document, fallbackSelector, options.sectionMarker);

  logger.debug(`[Segmenter] Extracting ${regions.length} pages`);

  return regions.map((region, index) => fieldExtractor(region, { document, sourcePreviewImage, index }));
}
