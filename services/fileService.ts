import { promises as fs } from 'node:fs';
import { errorMessage } from '../errors';
import type { OcrProvider, PageRange, PdfInfo, TextExtractor } from '../types';

// Below this many characters the text layer is treated as missing (scanned pages).
const MIN_DIRECT_TEXT_LENGTH = 100;

export const NO_OCR_TEXT = 'OCR process yielded no text.';

interface PdfPageLike {
  getTextContent(): Promise<{ items: readonly unknown[] }>;
  cleanup(): unknown;
}

export interface PdfDocumentLike {
  readonly numPages: number;
  getPage(pageNumber: number): Promise<PdfPageLike>;
  getMetadata(): Promise<{ info: unknown }>;
  destroy(): Promise<void>;
}

export type PdfLoader = (data: Uint8Array) => Promise<PdfDocumentLike>;

const loadWithPdfjs: PdfLoader = async data => {
  const pdfjs = await import('pdfjs-dist/legacy/build/pdf.mjs');
  return pdfjs.getDocument({ data, isEvalSupported: false, useSystemFonts: true }).promise;
};

export const pageSeparator = (pageNumber: number): string => `\n\n--- Page ${pageNumber} End ---\n\n`;

const contentLength = (text: string): number => text.replace(/--- Page \d+ End ---/g, '').trim().length;

const itemText = (item: unknown): string => {
  if (typeof item !== 'object' || item === null || !('str' in item) || typeof item.str !== 'string') return '';
  const eol = 'hasEOL' in item && item.hasEOL === true;
  return eol ? `${item.str}\n` : item.str;
};

const metadataField = (info: unknown, field: 'Title' | 'Author'): string => {
  if (typeof info !== 'object' || info === null || !(field in info)) return 'Unknown';
  const value: unknown = Reflect.get(info, field);
  return typeof value === 'string' && value.trim() ? value.trim() : 'Unknown';
};

/**
 * Reads the text layer of a PDF with pdf.js, falling back to OCR when the
 * layer is empty. Failures are returned as "Error: ..." text, never thrown.
 */
export class PdfTextExtractor implements TextExtractor {
  constructor(
    private readonly ocr: OcrProvider | null = null,
    private readonly loadPdf: PdfLoader = loadWithPdfjs,
  ) {}

  async extractText(pdfPath: string, pageRange: PageRange): Promise<string> {
    let pdf: PdfDocumentLike;
    try {
      pdf = await this.open(pdfPath);
    } catch (error) {
      console.error(`[Extractor] Could not open ${pdfPath}:`, errorMessage(error));
      return `Error: could not open PDF: ${errorMessage(error)}`;
    }

    const firstPage = Math.max(1, pageRange.startPage ?? 1);
    const lastPage = Math.min(pdf.numPages, pageRange.endPage ?? pdf.numPages);

    let direct = '';
    try {
      direct = await this.readTextLayer(pdf, firstPage, lastPage);
    } catch (error) {
      console.warn('[Extractor] Direct extraction failed:', errorMessage(error));
    } finally {
      await pdf.destroy();
    }

    if (contentLength(direct) > MIN_DIRECT_TEXT_LENGTH) {
      console.log(`[Extractor] Direct extraction: ${direct.length} chars from pages ${firstPage}-${lastPage}`);
      return direct;
    }

    if (!this.ocr) {
      return contentLength(direct) > 0 ? direct : 'Error: no text layer found in the selected pages and OCR is not configured';
    }

    console.log('[Extractor] Text layer too short, falling back to OCR');
    try {
      const recognized = await this.ocr.recognizePages(pdfPath, firstPage, lastPage);
      return recognized.trim() ? recognized : NO_OCR_TEXT;
    } catch (error) {
      console.error('[Extractor] OCR failed:', errorMessage(error));
      return `Error: OCR failed: ${errorMessage(error)}`;
    }
  }

  async getPdfInfo(pdfPath: string): Promise<PdfInfo> {
    try {
      const pdf = await this.open(pdfPath);
      try {
        const { info } = await pdf.getMetadata();
        return {
          totalPages: pdf.numPages,
          title: metadataField(info, 'Title'),
          author: metadataField(info, 'Author'),
        };
      } finally {
        await pdf.destroy();
      }
    } catch (error) {
      console.error(`[Extractor] Could not read PDF info for ${pdfPath}:`, errorMessage(error));
      return { totalPages: 0, title: 'Unknown', author: 'Unknown' };
    }
  }

  private async open(pdfPath: string): Promise<PdfDocumentLike> {
    const data = new Uint8Array(await fs.readFile(pdfPath));
    return this.loadPdf(data);
  }

  private async readTextLayer(pdf: PdfDocumentLike, firstPage: number, lastPage: number): Promise<string> {
    let text = '';
    for (let pageNumber = firstPage; pageNumber <= lastPage; pageNumber++) {
      const page = await pdf.getPage(pageNumber);
      const content = await page.getTextContent();
      text += content.items.map(itemText).join('') + pageSeparator(pageNumber);
      page.cleanup();
    }
    return text;
  }
}
