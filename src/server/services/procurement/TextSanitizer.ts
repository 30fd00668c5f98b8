/**
 * TextSanitizer - turns an uploaded offer into bounded plain text for the prompt
 */

import type { Logger } from 'pino';
import type { PdfTextSource } from '../../extraction/pdf/PdfExtractor.js';
import { logger as rootLogger } from '../../utils/logger.js';
import type { CleanedText, RawDocument, StageResult } from './types.js';

export const PDF_MEDIA_TYPE = 'application/pdf';
const PDF_SIGNATURE = '%PDF-';

export interface TextSanitizerOptions {
  /** Character ceiling for the cleaned text; approximates the model's context budget */
  maxChars: number;
  /** Keep only the leading pages; 0 keeps all */
  maxPages?: number;
  logger?: Logger;
}

// C0/C1 controls except \t and \n, plus the replacement character pdf.js emits for unmapped glyphs
// eslint-disable-next-line no-control-regex
const CONTROL_CHARS = /[\u0000-\u0008\u000B-\u001F\u007F-\u009F\uFFFD]/g;

/**
 * Normalize the text of one page: no control characters, single spaces, trimmed lines,
 * at most one blank line in a row
 */
export function cleanPageText(raw: string): string {
  return raw
    .replace(/\r\n?/g, '\n')
    .replace(CONTROL_CHARS, '')
    .replace(/[ \t\f\v\u00A0\u2000-\u200B\u202F\u3000]+/g, ' ')
    .split('\n')
    .map((line) => line.trim())
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

/**
 * Cut `text` to at most `maxChars` characters at a whitespace boundary, keeping the start.
 * A leading word longer than the budget is cut hard.
 */
export function truncateAtWhitespace(text: string, maxChars: number): string {
  if (text.length <= maxChars) {
    return text;
  }
  const head = text.slice(0, maxChars);
  if (/\s/.test(text.charAt(maxChars))) {
    return head.trimEnd();
  }
  const lastBreak = head.search(/\s\S*$/);
  if (lastBreak <= 0) {
    return head;
  }
  return head.slice(0, lastBreak).trimEnd();
}

export function pageMarker(pageNumber: number): string {
  return `--- Page ${pageNumber} ---`;
}

function isPdfMediaType(mediaType: string): boolean {
  const essence = mediaType.split(';')[0]?.trim().toLowerCase();
  return essence === PDF_MEDIA_TYPE;
}

export class TextSanitizer {
  private readonly maxChars: number;
  private readonly maxPages: number;
  private readonly logger: Logger;

  constructor(
    private readonly source: PdfTextSource,
    options: TextSanitizerOptions
  ) {
    if (options.maxChars < 1) {
      throw new RangeError(`maxChars must be positive, got ${options.maxChars}`);
    }
    this.maxChars = options.maxChars;
    this.maxPages = options.maxPages ?? 0;
    this.logger = options.logger ?? rootLogger;
  }

  async sanitize(document: RawDocument): Promise<StageResult<CleanedText, 'UnreadableDocument'>> {
    if (!isPdfMediaType(document.mediaType)) {
      return unreadable(`Unsupported media type "${document.mediaType}"; expected ${PDF_MEDIA_TYPE}`);
    }
    if (document.bytes.subarray(0, PDF_SIGNATURE.length).toString('latin1') !== PDF_SIGNATURE) {
      return unreadable('File is not a PDF document');
    }

    let pages: string[];
    try {
      pages = await this.source.extractPages(document.bytes, { maxPages: this.maxPages });
    } catch (error) {
      this.logger.warn(
        { error: error instanceof Error ? error.message : String(error), fileName: document.fileName },
        'PDF text extraction failed'
      );
      return unreadable('PDF could not be parsed');
    }

    const sections: string[] = [];
    for (const [index, page] of pages.entries()) {
      const cleaned = cleanPageText(page);
      if (cleaned.length > 0) {
        sections.push(`${pageMarker(index + 1)}\n${cleaned}`);
      }
    }

    if (sections.length === 0) {
      this.logger.info(
        { pageCount: pages.length, fileName: document.fileName },
        'PDF has no text layer (scanned or image-only document)'
      );
      return unreadable('Document contains no extractable text (scanned or image-only PDF)');
    }

    const fullText = sections.join('\n\n');
    const text = truncateAtWhitespace(fullText, this.maxChars);
    const truncated = text.length < fullText.length;

    if (truncated) {
      this.logger.debug(
        { originalLength: fullText.length, keptLength: text.length, maxChars: this.maxChars },
        'Document text truncated to context budget'
      );
    }

    return {
      ok: true,
      value: {
        text,
        pageCount: pages.length,
        pagesWithText: sections.length,
        truncated,
        originalLength: fullText.length,
      },
    };
  }
}

function unreadable(message: string): StageResult<CleanedText, 'UnreadableDocument'> {
  return { ok: false, failure: { reason: 'UnreadableDocument', message } };
}
