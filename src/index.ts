export type {
  ExtractPagesOptions,
  FieldExtractionContext,
  MarkupDocument,
  MarkupNode,
  PageExtractor,
  PageFieldExtractor,
  PageRecord,
  SectionMarker,
} from './types.js';
export { JsdomDocument, JsdomNode, fromDocument, parseHtml, type ParseHtmlOptions } from './dom/jsdom.js';
export { innerTextOfFirst, selectFirst, selectNodes } from './dom/query.js';
export {
  DEFAULT_SECTION_MARKER,
  defaultFieldExtractor,
  extractPages,
  findRegions,
  findSourcePreviewImage,
  sectionXPath,
} from './extractor/segmenter.js';
export {
  NON_CONTENT_TAGS,
  cleanRegion,
  nodeTypeXPath,
  normalizeWhitespace,
  removeNodes,
  removeNodesOfType,
  stripNonContentNodes,
} from './extractor/text-normalizer.js';
export { DEFAULT_FALLBACK_XPATH, TextExtractor, type TextExtractorOptions } from './extractor/text-extractor.js';
export { loadConfig, type ExtractorConfig } from './config.js';
export { ExtractionError } from './util/errors.js';
