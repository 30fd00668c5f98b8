/**
 * PdfExtractor - Extract per-page text from PDF documents
 *
 * Only the text layer is read (pdf.js text content), so embedded images, fonts
 * and other binary streams never reach the output.
 */

import { createRequire } from 'module';
import { logger } from '../../utils/logger.js';

// pdf-parse is a CommonJS module whose index runs a self-test when loaded without
// a parent module; loading it through require gives it one.
const require = createRequire(import.meta.url);

interface PdfTextItem {
  str: string;
  transform: number[];
}

interface PdfPageData {
  /** Zero-based page number */
  pageIndex: number;
  getTextContent(options: { normalizeWhitespace: boolean; disableCombineTextItems: boolean }): Promise<{
    items: PdfTextItem[];
  }>;
}

interface PdfParseResult {
  text: string;
  numpages: number;
  /** Pages pdf-parse attempted, after the `max` limit */
  numrender: number;
}

export type PdfParse = (
  buffer: Buffer,
  options?: { max?: number; pagerender?: (pageData: PdfPageData) => Promise<string> }
) => Promise<PdfParseResult>;

const pdfParse: PdfParse = require('pdf-parse');

/**
 * Source of raw page text. The sanitizer depends on this, not on pdf-parse.
 */
export interface PdfTextSource {
  /**
   * @returns One entry per page, in page order (possibly empty strings)
   */
  extractPages(pdfBuffer: Buffer, options?: { maxPages?: number }): Promise<string[]>;
}

/**
 * Join text items of one page, starting a new line whenever the baseline moves
 */
async function renderPage(pageData: PdfPageData): Promise<string> {
  const content = await pageData.getTextContent({
    normalizeWhitespace: false,
    disableCombineTextItems: false,
  });

  let text = '';
  let lastY: number | undefined;
  for (const item of content.items) {
    const y = item.transform[5];
    if (lastY === undefined || lastY === y) {
      text += item.str;
    } else {
      text += '\n' + item.str;
    }
    lastY = y;
  }
  return text;
}

/**
 * PdfExtractor - Extract text from PDF via pdf-parse
 */
export class PdfExtractor implements PdfTextSource {
  constructor(private readonly parse: PdfParse = pdfParse) {}

  async extractPages(pdfBuffer: Buffer, options: { maxPages?: number } = {}): Promise<string[]> {
    const rendered: string[] = [];

    const data = await this.parse(pdfBuffer, {
      max: options.maxPages ?? 0, // 0 = no limit on pages
      pagerender: async (pageData) => {
        const text = await renderPage(pageData);
        rendered[pageData.pageIndex] = text;
        return text;
      },
    });

    // pdf-parse swallows a page that fails to load and never calls pagerender for it;
    // keep its slot so later pages keep their numbers
    const pages: string[] = [];
    for (let index = 0; index < Math.max(data.numrender, rendered.length); index++) {
      pages.push(rendered[index] ?? '');
    }

    logger.debug(
      {
        pageCount: data.numpages,
        renderedPages: Object.keys(rendered).length,
        textLength: data.text.length,
      },
      'PDF extraction completed'
    );

    return pages;
  }
}
