/**
 * Baseline OCR Engine
 *
 * tesseract.js LSTM recognition over the page images rendered upstream.
 * Trained data is read from the configured tessdata directory; nothing is
 * downloaded at run time. Always produces something, often noisy, and is the
 * independent witness the fidelity verifier compares vision output against.
 */

import { createWorker, OEM, type Worker as TesseractWorker } from 'tesseract.js';
import {
  BaseEngine,
  config,
  logger,
  type EngineCallOptions,
  type EngineContext,
  type EngineOutput,
  type SourceAsset,
} from '@advice-corpus/shared';

export interface OcrEngineOptions extends EngineCallOptions {
  language?: string;
  langPath?: string;
}

export class BaselineOcrEngine extends BaseEngine {
  readonly role = 'baseline-ocr' as const;
  readonly method = 'baseline-ocr' as const;
  readonly description = 'tesseract.js LSTM over page images';

  private readonly language: string;
  private readonly langPath: string;
  private worker: Promise<TesseractWorker> | null = null;

  constructor(options: OcrEngineOptions = {}) {
    super(options);
    this.language = options.language ?? 'eng';
    this.langPath = options.langPath ?? config.tessdataPath;
  }

  private getWorker(): Promise<TesseractWorker> {
    if (!this.worker) {
      this.worker = createWorker(this.language, OEM.LSTM_ONLY, {
        langPath: this.langPath,
        cacheMethod: 'none',
        gzip: false,
      });
      this.worker.catch(() => {
        // A failed start is retried on the next call
        this.worker = null;
      });
    }
    return this.worker;
  }

  protected async transcribe(source: SourceAsset, ctx: EngineContext): Promise<EngineOutput> {
    if (source.pageImages.length === 0) {
      logger.warn('No page images for OCR', { registry_key: ctx.registryKey });
      return { pages: [], pageCount: 0, cost: 0, model: null };
    }

    const worker = await this.getWorker();
    const pages: string[] = [];
    for (const image of source.pageImages) {
      const result = await worker.recognize(image);
      pages.push(result.data.text);
    }

    return { pages, pageCount: source.pageImages.length, cost: 0, model: `tesseract:${this.language}` };
  }

  async terminate(): Promise<void> {
    if (!this.worker) return;
    const worker = await this.worker;
    this.worker = null;
    await worker.terminate();
  }
}
