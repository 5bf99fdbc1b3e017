/**
 * Base Extraction Engine
 *
 * Abstract base class for engine adapters. Subclasses implement transcribe();
 * the base class bounds every call with a timeout and a small retry budget,
 * scores the result and freezes it into an ExtractionAttempt.
 */

import { ulid } from 'ulid';
import type { ExtractionAttempt, ExtractionMethod, SourceAsset, TranscriptionPass } from '../types';
import type { EngineCallOptions, EngineContext, EngineOutput, EngineRole, ExtractionEngine } from './types';
import { config } from '../config';
import { logger } from '../logger';
import { EngineFailure } from '../errors';
import { withRetry, withTimeout } from '../retry';
import { scoreQuality, splitWords } from '../quality/scorer';
import { engineAttemptsCounter, engineDurationHistogram } from '../metrics';

/** Pages are joined with a blank line so page breaks survive as paragraph breaks */
export const PAGE_SEPARATOR = '\n\n';

export abstract class BaseEngine implements ExtractionEngine {
  abstract readonly role: EngineRole;
  abstract readonly method: ExtractionMethod;
  abstract readonly description: string;
  readonly pass: TranscriptionPass = 'standard';

  private readonly callOptions: Required<EngineCallOptions>;

  constructor(options: EngineCallOptions = {}) {
    this.callOptions = {
      timeoutMs: options.timeoutMs ?? config.engineTimeoutMs,
      maxRetries: options.maxRetries ?? config.engineMaxRetries,
      backoffMs: options.backoffMs ?? config.engineBackoffMs,
    };
  }

  /**
   * Produce raw page text for a source asset.
   * Must be implemented by subclasses.
   */
  protected abstract transcribe(source: SourceAsset, ctx: EngineContext): Promise<EngineOutput>;

  async attempt(source: SourceAsset, ctx: EngineContext): Promise<ExtractionAttempt> {
    const startTime = Date.now();
    const labels = { method: this.method, pass: this.pass };

    logger.info('Starting engine attempt', {
      engine: this.role,
      ...labels,
      registry_key: ctx.registryKey,
    });

    let output: EngineOutput;
    try {
      output = await withRetry(
        () => withTimeout(this.transcribe(source, ctx), this.callOptions.timeoutMs, `${this.role} engine`),
        {
          maxRetries: this.callOptions.maxRetries,
          baseDelayMs: this.callOptions.backoffMs,
          onRetry: (error, attempt) => {
            logger.warn('Engine call failed, retrying', {
              engine: this.role,
              attempt,
              error: error.message,
            });
          },
        }
      );
    } catch (error) {
      const durationMs = Date.now() - startTime;
      engineAttemptsCounter.inc({ ...labels, outcome: 'failed' });
      engineDurationHistogram.observe(labels, durationMs / 1000);
      logger.error('Engine exhausted retries', error, {
        engine: this.role,
        registry_key: ctx.registryKey,
        duration_ms: durationMs,
      });
      throw new EngineFailure(this.role, error);
    }

    const durationMs = Date.now() - startTime;
    const attempt = this.buildAttempt(output, durationMs);

    engineAttemptsCounter.inc({ ...labels, outcome: attempt.word_count > 0 ? 'ok' : 'empty' });
    engineDurationHistogram.observe(labels, durationMs / 1000);

    logger.info('Engine attempt complete', {
      engine: this.role,
      ...labels,
      attempt_id: attempt.attempt_id,
      page_count: attempt.page_count,
      word_count: attempt.word_count,
      quality_score: attempt.quality_score,
      cost: attempt.cost,
      duration_ms: durationMs,
    });

    return attempt;
  }

  protected buildAttempt(output: EngineOutput, durationMs: number): ExtractionAttempt {
    const pages = output.pages.map((p) => p.trim());
    const text = pages.filter((p) => p.length > 0).join(PAGE_SEPARATOR);
    const pageCount = Math.max(output.pageCount, pages.length);

    return Object.freeze({
      attempt_id: ulid(),
      method: this.method,
      pass: this.pass,
      text,
      pages: Object.freeze(pages),
      page_count: pageCount,
      word_count: splitWords(text).length,
      quality_score: scoreQuality(text, pageCount).final_score,
      cost: output.cost,
      model: output.model,
      duration_ms: durationMs,
      created_at: new Date().toISOString(),
    });
  }
}
