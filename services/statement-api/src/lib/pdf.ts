/**
 * Layout-Aware PDF Text Extraction
 *
 * Reads the embedded text layer with pdfjs-dist. Image-only (scanned) PDFs
 * have no text layer and come back blank, which the adapter reports as a
 * layout failure.
 */

import path from 'path';
import { logger, type BackendOutput, type TextExtractionBackend } from '@ledgerline/shared';

// pdfjs-dist ships its Node build as ES modules only; load it on first use
function importPdfJs() {
  return import('pdfjs-dist/legacy/build/pdf.mjs');
}

type PdfJs = Awaited<ReturnType<typeof importPdfJs>>;

let pdfjsLib: Promise<PdfJs> | null = null;

function loadPdfJs(): Promise<PdfJs> {
  if (!pdfjsLib) {
    pdfjsLib = importPdfJs().then((lib) => {
      // Configure worker for Node.js environment
      lib.GlobalWorkerOptions.workerSrc = path.join(
        path.dirname(require.resolve('pdfjs-dist/package.json')),
        'legacy/build/pdf.worker.mjs'
      );
      return lib;
    });
  }
  return pdfjsLib;
}

export interface PageText {
  pageNumber: number;
  text: string;
}

interface PositionedText {
  x: number;
  str: string;
}

/**
 * Extract text page by page, preserving line structure.
 *
 * Groups text items by Y position to maintain document layout, so that
 * statement rows (date, description, amount, balance) stay on one line.
 */
export async function extractPages(bytes: Buffer): Promise<PageText[]> {
  // Copy: pdfjs may transfer the underlying buffer
  const data = new Uint8Array(bytes);
  const { getDocument } = await loadPdfJs();
  const pdf = await getDocument({ data, isEvalSupported: false }).promise;

  try {
    const pages: PageText[] = [];

    for (let pageNum = 1; pageNum <= pdf.numPages; pageNum++) {
      const page = await pdf.getPage(pageNum);
      const textContent = await page.getTextContent();

      // Group text items by Y position to preserve line structure
      const itemsByY = new Map<number, PositionedText[]>();

      for (const item of textContent.items) {
        if (!('str' in item) || item.str.trim() === '') continue;

        // Round Y position to group items on the same line
        // (text on the same visual line may have slight Y variations)
        const y = Math.round(item.transform[5]);
        const x = Math.round(item.transform[4]);

        const line = itemsByY.get(y) ?? [];
        line.push({ x, str: item.str });
        itemsByY.set(y, line);
      }

      // Top to bottom, then left to right
      const lines = [...itemsByY.entries()]
        .sort(([a], [b]) => b - a)
        .map(([, items]) =>
          items
            .sort((a, b) => a.x - b.x)
            .map((item) => item.str)
            .join(' ')
            .trim()
        )
        .filter((line) => line.length > 0);

      pages.push({ pageNumber: pageNum, text: lines.join('\n') });
    }

    return pages;
  } finally {
    await pdf.destroy();
  }
}

export function joinPages(pages: PageText[]): string {
  return pages
    .filter((p) => p.text.trim().length > 0)
    .map((p) => `--- Page ${p.pageNumber} ---\n${p.text}`)
    .join('\n\n');
}

export class PdfLayoutBackend implements TextExtractionBackend {
  readonly method = 'layout' as const;

  async extract(bytes: Buffer): Promise<BackendOutput> {
    const pages = await extractPages(bytes);
    const text = joinPages(pages);

    logger.info('PDF text layer read', {
      totalPages: pages.length,
      totalChars: text.length,
    });

    return { text, page_count: pages.length };
  }
}
