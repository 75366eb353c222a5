import pdfParse from 'pdf-parse';
import { PdfTextExtractor } from '../types';
import { EmptyDocumentError, ExtractionError, errorMessage } from '../utils/errors';

interface PdfTextItem {
  str: string;
  transform: number[];
}

// Subset of the pdf.js page proxy that pdf-parse hands to `pagerender`
export interface PdfPageData {
  getTextContent(options?: {
    normalizeWhitespace?: boolean;
    disableCombineTextItems?: boolean;
  }): Promise<{ items: PdfTextItem[] }>;
}

export type PdfParser = (buffer: Buffer, options?: pdfParse.Options) => Promise<pdfParse.Result>;

type PageOutcome = { ok: true; text: string } | { ok: false; error: unknown };

export async function renderPageText(pageData: PdfPageData): Promise<string> {
  const content = await pageData.getTextContent({
    normalizeWhitespace: false,
    disableCombineTextItems: false
  });

  let lastY: number | undefined;
  let text = '';
  for (const item of content.items) {
    const y = item.transform[5];
    if (lastY === undefined || lastY === y) {
      text += item.str;
    } else {
      text += '\n' + item.str;
    }
    lastY = y;
  }
  return text.replace(/\r\n?/g, '\n');
}

export class TextExtractionService implements PdfTextExtractor {
  constructor(private readonly parse: PdfParser = pdfParse) {}

  /**
   * Returns one text entry per page, in page order. Pages without text are
   * kept as empty strings so page numbering stays aligned with the PDF.
   */
  async extractPages(buffer: Buffer): Promise<string[]> {
    if (buffer.length === 0) {
      throw new ExtractionError('Uploaded file is empty');
    }

    // pdf-parse awaits each `pagerender` before loading the next page, so
    // outcomes arrive in page order. It turns render failures into "" itself,
    // so they are recorded here.
    const outcomes: PageOutcome[] = [];
    let result: pdfParse.Result;

    try {
      result = await this.parse(buffer, {
        pagerender: async (pageData: PdfPageData) => {
          try {
            const text = await renderPageText(pageData);
            outcomes.push({ ok: true, text });
            return text;
          } catch (error) {
            outcomes.push({ ok: false, error });
            return '';
          }
        }
      });
    } catch (error) {
      console.warn(`[TextExtractionService] PDF could not be parsed: ${errorMessage(error)}`);
      throw new ExtractionError(`Failed to parse PDF: ${errorMessage(error)}`, { cause: error });
    }

    const pages: string[] = [];
    for (const [index, outcome] of outcomes.entries()) {
      if (!outcome.ok) {
        throw new ExtractionError(
          `Failed to extract text from page ${index + 1}: ${errorMessage(outcome.error)}`,
          { cause: outcome.error }
        );
      }
      pages.push(outcome.text);
    }
    if (pages.length < result.numrender) {
      throw new ExtractionError(`Failed to load ${result.numrender - pages.length} of ${result.numrender} page(s)`);
    }

    if (pages.length === 0) {
      throw new ExtractionError('PDF contains no pages');
    }
    if (pages.every(page => page.trim().length === 0)) {
      throw new EmptyDocumentError(pages.length);
    }

    console.log(`[TextExtractionService] Extracted ${pages.length} pages`);
    return pages;
  }
}
