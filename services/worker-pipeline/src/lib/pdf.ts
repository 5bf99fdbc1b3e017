/**
 * Text Layer Engine
 *
 * Reads the embedded text layer with pdfjs-dist. Cheap and deterministic,
 * and empty on scans that were never OCR'd.
 */

import fs from 'fs';
import path from 'path';
import * as pdfjsLib from 'pdfjs-dist/legacy/build/pdf.mjs';
import {
  BaseEngine,
  logger,
  type EngineContext,
  type EngineOutput,
  type SourceAsset,
} from '@advice-corpus/shared';

// Configure worker for Node.js environment
const workerPath = path.join(
  path.dirname(require.resolve('pdfjs-dist/package.json')),
  'legacy/build/pdf.worker.mjs'
);
pdfjsLib.GlobalWorkerOptions.workerSrc = workerPath;

interface PositionedText {
  x: number;
  str: string;
}

/**
 * Extract text per page, preserving line structure.
 *
 * Items are grouped by rounded Y position (top to bottom) and ordered by X
 * within a line; text on one visual line can sit at slightly different Y.
 */
export async function extractPdfPages(filePath: string): Promise<{ pages: string[]; totalPages: number }> {
  const data = new Uint8Array(fs.readFileSync(filePath));
  const pdf = await pdfjsLib.getDocument({ data }).promise;

  const pages: string[] = [];
  try {
    for (let pageNum = 1; pageNum <= pdf.numPages; pageNum++) {
      const page = await pdf.getPage(pageNum);
      const textContent = await page.getTextContent();

      const itemsByY = new Map<number, PositionedText[]>();
      for (const item of textContent.items) {
        if (!('str' in item) || item.str.trim() === '') continue;

        const y = Math.round(item.transform[5]);
        const x = Math.round(item.transform[4]);
        const line = itemsByY.get(y) ?? [];
        line.push({ x, str: item.str });
        itemsByY.set(y, line);
      }

      const lines = Array.from(itemsByY.keys())
        .sort((a, b) => b - a)
        .map((y) =>
          (itemsByY.get(y) ?? [])
            .sort((a, b) => a.x - b.x)
            .map((item) => item.str)
            .join(' ')
            .trim()
        )
        .filter((line) => line.length > 0);

      pages.push(lines.join('\n'));
      page.cleanup();
    }
  } finally {
    await pdf.destroy();
  }

  return { pages, totalPages: pages.length };
}

export class TextLayerEngine extends BaseEngine {
  readonly role = 'text-layer' as const;
  readonly method = 'text-layer' as const;
  readonly description = 'Embedded PDF text layer (pdfjs-dist)';

  protected async transcribe(source: SourceAsset, ctx: EngineContext): Promise<EngineOutput> {
    if (!source.pdfPath) {
      logger.debug('No PDF for text layer', { registry_key: ctx.registryKey });
      return { pages: [], pageCount: source.pageImages.length, cost: 0, model: null };
    }

    const { pages, totalPages } = await extractPdfPages(source.pdfPath);
    return { pages, pageCount: totalPages, cost: 0, model: null };
  }
}
