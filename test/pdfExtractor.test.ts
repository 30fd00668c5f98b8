import { readFile } from 'fs/promises';
import { fileURLToPath } from 'url';
import { describe, it, expect } from 'vitest';
import { PdfExtractor, type PdfParse } from '../src/server/extraction/pdf/PdfExtractor.js';
import { TextSanitizer } from '../src/server/services/procurement/TextSanitizer.js';

const FIXTURE = fileURLToPath(new URL('./fixtures/three-page-offer.pdf', import.meta.url));

/**
 * Stands in for pdf-parse: renders the given pages, skipping `failing` the way
 * pdf-parse does when a page cannot be loaded
 */
function parseWith(pages: string[], failing: number[] = []): PdfParse {
  return async (_buffer, options = {}) => {
    for (const [pageIndex, line] of pages.entries()) {
      if (failing.includes(pageIndex) || !options.pagerender) {
        continue;
      }
      await options.pagerender({
        pageIndex,
        getTextContent: async () => ({ items: [{ str: line, transform: [1, 0, 0, 1, 72, 720] }] }),
      });
    }
    return { text: pages.join('\n\n'), numpages: pages.length, numrender: pages.length };
  };
}

describe('PdfExtractor', () => {
  it('reads each page of a real PDF in page order', async () => {
    const bytes = await readFile(FIXTURE);

    const pages = await new PdfExtractor().extractPages(bytes);

    expect(pages).toHaveLength(3);
    expect(pages[0]).toBe('Northwind Software GmbH\nOffer 2024-117');
    expect(pages[1]).toBe('');
    expect(pages[2]).toBe('Net total 1500.00 EUR');
  });

  it('stops after the page limit', async () => {
    const bytes = await readFile(FIXTURE);

    const pages = await new PdfExtractor().extractPages(bytes, { maxPages: 1 });

    expect(pages).toEqual(['Northwind Software GmbH\nOffer 2024-117']);
  });

  it('labels pages by their position in the document', async () => {
    const sanitizer = new TextSanitizer(new PdfExtractor(), { maxChars: 1000 });

    const result = await sanitizer.sanitize({ bytes: await readFile(FIXTURE), mediaType: 'application/pdf' });

    expect(result).toMatchObject({
      ok: true,
      value: {
        text: '--- Page 1 ---\nNorthwind Software GmbH\nOffer 2024-117\n\n--- Page 3 ---\nNet total 1500.00 EUR',
        pageCount: 3,
        pagesWithText: 2,
      },
    });
  });

  it('keeps the slot of a page that failed to load', async () => {
    const extractor = new PdfExtractor(parseWith(['first', 'second', 'third'], [1]));

    const pages = await extractor.extractPages(Buffer.from('%PDF-1.4'));

    expect(pages).toEqual(['first', '', 'third']);
  });

  it('numbers later pages correctly after a failed page', async () => {
    const extractor = new PdfExtractor(parseWith(['Acme GmbH', 'broken', 'Total 100'], [1]));
    const sanitizer = new TextSanitizer(extractor, { maxChars: 1000 });

    const result = await sanitizer.sanitize({ bytes: Buffer.from('%PDF-1.4 stub'), mediaType: 'application/pdf' });

    expect(result).toMatchObject({
      ok: true,
      value: { text: '--- Page 1 ---\nAcme GmbH\n\n--- Page 3 ---\nTotal 100', pageCount: 3 },
    });
  });
});
