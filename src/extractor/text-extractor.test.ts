import { parseHtml } from '../dom/jsdom.js';
import { FieldExtractionContext, MarkupDocument, MarkupNode, PageRecord } from '../types.js';
import { DEFAULT_FALLBACK_XPATH, TextExtractor } from './text-extractor.js';

class TrimmingExtractor extends TextExtractor {
  protected normalizeWhitespace(text: string | null): string | null {
    return super.normalizeWhitespace(text)?.trim() ?? null;
  }
}

class NavStrippingExtractor extends TextExtractor {
  protected removeNodesOfType(document: MarkupDocument, ...tagNames: string[]): void {
    super.removeNodesOfType(document, ...tagNames, 'nav');
  }
}

class UntitledExtractor extends TextExtractor {
  protected extractFields(region: MarkupNode, context: FieldExtractionContext): PageRecord {
    const page = super.extractFields(region, context);
    return { ...page, title: page.title ?? 'Untitled' };
  }
}

describe('TextExtractor', () => {
  it('should default the fallback selector to the page body', () => {
    const extractor = new TextExtractor();
    const doc = parseHtml('<html><head></head><body>Only text</body></html>');

    expect(extractor.fallbackXPath).toBe(DEFAULT_FALLBACK_XPATH);
    expect(extractor.extractPages(doc)).toStrictEqual([{ content: 'Only text' }]);
  });

  it('should use a configured fallback selector', () => {
    const extractor = new TextExtractor({ fallbackXPath: '//main' });
    const doc = parseHtml('<html><head></head><body><nav>Menu</nav><main>Body</main></body></html>');

    expect(extractor.extractPages(doc)).toStrictEqual([{ content: 'Body' }]);
    expect(extractor.cleanRegion(doc)).toBe('Body');
  });

  it('should let an explicit selector win over the configured one', () => {
    const extractor = new TextExtractor({ fallbackXPath: '//main' });
    const doc = parseHtml('<html><head></head><body><aside>Side</aside><main>Body</main></body></html>');

    expect(extractor.extractPages(doc, '//aside')).toStrictEqual([{ content: 'Side' }]);
  });

  it('should apply the section marker and field extractor options', () => {
    const extractor = new TextExtractor({
      sectionMarker: { attribute: 'data-part', values: ['chapter'] },
      fieldExtractor: (region, context) => ({ content: `${context.index}:${region.innerText}` }),
    });
    const doc = parseHtml('<html><body><div data-part="chapter">One</div><div data-part="chapter">Two</div></body></html>');

    expect(extractor.extractPages(doc)).toStrictEqual([{ content: '0:One' }, { content: '1:Two' }]);
  });

  describe('cleanRegion', () => {
    it('should strip scripts and normalize the region text', () => {
      const doc = parseHtml('<html><head></head><body><p>A   b</p>\n\n<script>x()</script><p>c</p></body></html>');
      expect(new TextExtractor().cleanRegion(doc)).toBe('A b\nc');
    });

    it('should return null for a missing document', () => {
      expect(new TextExtractor().cleanRegion(null)).toBeNull();
    });

    it('should return null when the region is missing', () => {
      const doc = parseHtml('<html><body><p>Text</p></body></html>');
      expect(new TextExtractor().cleanRegion(doc, '//article')).toBeNull();
    });
  });

  describe('overrides', () => {
    it('should route cleaned text through normalizeWhitespace', () => {
      const doc = parseHtml('<html><head></head><body>\n  Hello  \n</body></html>');
      expect(new TrimmingExtractor().cleanRegion(doc)).toBe('Hello');
    });

    it('should route node removal through removeNodesOfType', () => {
      const doc = parseHtml('<html><head></head><body><nav>Menu</nav><p>Text</p></body></html>');

      expect(new NavStrippingExtractor().cleanRegion(doc)).toBe('Text');
      expect(doc.root?.query('//nav')).toEqual([]);
    });

    it('should route each region through extractFields', () => {
      const doc = parseHtml('<html><head></head><body><h2>Named</h2></body></html>');

      expect(new UntitledExtractor().extractPages(doc)).toStrictEqual([{ content: 'Named', title: 'Named' }]);
      expect(new UntitledExtractor().extractPages(doc, '//head')).toStrictEqual([{ content: '', title: 'Untitled' }]);
    });
  });
});
