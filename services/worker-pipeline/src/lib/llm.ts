/**
 * Vision Transcription Engines
 *
 * OpenAI chat completions over page images, one request per page so that
 * description-mode output can be traced to the page that produced it. The
 * constrained variant is the verbatim-only remediation pass run on output
 * that failed verification.
 */

import fs from 'fs';
import path from 'path';
import OpenAI from 'openai';
import {
  BaseEngine,
  config,
  logger,
  CONSTRAINED_TRANSCRIPTION_PROMPT,
  STANDARD_TRANSCRIPTION_PROMPT,
  type EngineCallOptions,
  type EngineContext,
  type EngineOutput,
  type SourceAsset,
  type TranscriptionPass,
} from '@advice-corpus/shared';

export interface VisionEngineOptions extends EngineCallOptions {
  model?: string;
  maxPages?: number;
  apiKey?: string;
  client?: OpenAI;
}

const IMAGE_MIME: Record<string, string> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.webp': 'image/webp',
};

function imageDataUrl(imagePath: string): string {
  const mime = IMAGE_MIME[path.extname(imagePath).toLowerCase()] ?? 'image/png';
  return `data:${mime};base64,${fs.readFileSync(imagePath).toString('base64')}`;
}

export function usageCost(promptTokens: number, completionTokens: number): number {
  return (
    (promptTokens * config.llmInputCostPerMillion + completionTokens * config.llmOutputCostPerMillion) / 1_000_000
  );
}

export class VisionTranscriptionEngine extends BaseEngine {
  readonly role: 'vision-transcription' | 'constrained-transcription' = 'vision-transcription';
  readonly method = 'vision-transcription' as const;
  readonly description: string = 'OpenAI vision transcription';
  protected readonly prompt: string = STANDARD_TRANSCRIPTION_PROMPT;

  private readonly model: string;
  private readonly maxPages: number;
  private readonly openai: OpenAI;

  constructor(options: VisionEngineOptions = {}) {
    super(options);
    this.model = options.model ?? config.llmModelVision;
    this.maxPages = options.maxPages ?? config.visionMaxPages;
    this.openai =
      options.client ??
      new OpenAI({
        apiKey: options.apiKey || process.env.OPENAI_API_KEY || config.openaiApiKey,
        maxRetries: 0, // Retries are bounded by the engine base class
      });
  }

  protected async transcribe(source: SourceAsset, ctx: EngineContext): Promise<EngineOutput> {
    const images = source.pageImages.slice(0, this.maxPages);
    if (images.length < source.pageImages.length) {
      logger.warn('Page count above vision limit, transcribing first pages only', {
        registry_key: ctx.registryKey,
        pages: source.pageImages.length,
        limit: this.maxPages,
      });
    }

    const pages: string[] = [];
    let cost = 0;
    for (const [index, image] of images.entries()) {
      const response = await this.openai.chat.completions.create({
        model: this.model,
        messages: [
          {
            role: 'user',
            content: [
              { type: 'text', text: this.prompt },
              { type: 'image_url', image_url: { url: imageDataUrl(image), detail: 'high' } },
            ],
          },
        ],
        temperature: 0,
      });

      const promptTokens = response.usage?.prompt_tokens ?? 0;
      const completionTokens = response.usage?.completion_tokens ?? 0;
      cost += usageCost(promptTokens, completionTokens);

      logger.debug('Vision page transcribed', {
        registry_key: ctx.registryKey,
        page: index + 1,
        request_id: response.id,
        tokens_used: response.usage?.total_tokens,
      });

      pages.push(response.choices[0]?.message?.content ?? '');
    }

    return { pages, pageCount: source.pageImages.length, cost, model: this.model };
  }
}

export class ConstrainedTranscriptionEngine extends VisionTranscriptionEngine {
  readonly role = 'constrained-transcription' as const;
  readonly pass: TranscriptionPass = 'constrained';
  readonly description = 'OpenAI vision transcription, verbatim-only remediation pass';
  protected readonly prompt = CONSTRAINED_TRANSCRIPTION_PROMPT;
}
