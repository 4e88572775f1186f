/**
 * PDF Text Extraction
 *
 * Text-layer collaborator backed by pdfjs-dist. Scanned documents, whose
 * pages carry no (or almost no) text, are reported as having no text layer.
 */

import fs from 'fs';
import path from 'path';
import * as pdfjsLib from 'pdfjs-dist/legacy/build/pdf';
import { config, logger, type PageText, type TextExtractor, type TextLayer } from '@ledgerline/shared';

// Configure worker for Node.js environment
const workerPath = path.join(
  path.dirname(require.resolve('pdfjs-dist/package.json')),
  'legacy/build/pdf.worker.js'
);
pdfjsLib.GlobalWorkerOptions.workerSrc = workerPath;

/**
 * Extract text from a PDF file, preserving line structure.
 *
 * Groups text items by Y position so that label and value printed on the
 * same visual line end up on the same text line.
 */
export async function extractTextFromPdf(filePath: string): Promise<PageText[]> {
  const data = new Uint8Array(await fs.promises.readFile(filePath));
  const pdf = await pdfjsLib.getDocument({ data, isEvalSupported: false }).promise;

  try {
    const pages: PageText[] = [];

    for (let pageNum = 1; pageNum <= pdf.numPages; pageNum++) {
      const page = await pdf.getPage(pageNum);
      const textContent = await page.getTextContent();

      // Round Y position to group items on the same line
      const itemsByY = new Map<number, Array<{ x: number; str: string }>>();

      for (const item of textContent.items) {
        if (!('str' in item) || item.str.trim() === '') continue;

        const y = Math.round(item.transform[5]);
        const x = Math.round(item.transform[4]);

        const line = itemsByY.get(y);
        if (line) {
          line.push({ x, str: item.str });
        } else {
          itemsByY.set(y, [{ x, str: item.str }]);
        }
      }

      // Top to bottom, then left to right
      const lines: string[] = [];
      const sortedYPositions = Array.from(itemsByY.keys()).sort((a, b) => b - a);
      for (const y of sortedYPositions) {
        const lineItems = (itemsByY.get(y) ?? []).sort((a, b) => a.x - b.x);
        const lineText = lineItems.map((item) => item.str).join(' ').trim();
        if (lineText) {
          lines.push(lineText);
        }
      }

      pages.push({ pageNumber: pageNum, text: lines.join('\n') });
    }

    return pages;
  } finally {
    await pdf.destroy();
  }
}

export class PdfTextExtractor implements TextExtractor {
  constructor(private readonly minTextChars: number = config.minTextChars) {}

  async extractText(filePath: string): Promise<TextLayer> {
    const pages = await extractTextFromPdf(filePath);
    const totalChars = pages.reduce((sum, page) => sum + page.text.replace(/\s+/g, '').length, 0);

    logger.debug('PDF text extraction complete', {
      filePath,
      totalPages: pages.length,
      totalChars,
    });

    if (totalChars < this.minTextChars) {
      return { kind: 'no-text-layer' };
    }
    return { kind: 'text', pages };
  }
}
