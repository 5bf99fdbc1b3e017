/**
 * Synthetic Section Generator
 *
 * Asks a small model for the question and conclusion of letters the section
 * parser could not structure. The response is schema-constrained, then
 * validated again with Ajv before anything from it reaches a record.
 */

import OpenAI from 'openai';
import {
  config,
  logger,
  validateSyntheticSections,
  type SyntheticSectionGenerator,
  type SyntheticSectionRequest,
  type SyntheticSectionResult,
} from '@advice-corpus/shared';
import { usageCost } from './llm';

/** Characters of letter text sent to the model */
const MAX_INPUT_CHARS = 24000;

const SYNTHETIC_SECTIONS_SCHEMA = {
  name: 'synthetic_sections',
  strict: true,
  schema: {
    type: 'object',
    additionalProperties: false,
    required: [
      'document_type',
      'question',
      'question_synthetic',
      'conclusion',
      'conclusion_synthetic',
      'summary',
      'extraction_confidence',
      'notes',
    ],
    properties: {
      document_type: {
        type: 'string',
        enum: ['advice_letter', 'informal_advice', 'opinion', 'correspondence'],
      },
      question: {
        type: ['string', 'null'],
        description: 'The question presented, copied verbatim from the letter, or null',
      },
      question_synthetic: {
        type: ['string', 'null'],
        description: 'One-sentence restatement of the question when the letter has no verbatim question',
      },
      conclusion: {
        type: ['string', 'null'],
        description: 'The conclusion or short answer, copied verbatim, or null',
      },
      conclusion_synthetic: {
        type: ['string', 'null'],
        description: 'One-sentence restatement of the conclusion when the letter has no verbatim conclusion',
      },
      summary: { type: ['string', 'null'] },
      extraction_confidence: { type: 'number', minimum: 0, maximum: 1 },
      notes: { type: ['string', 'null'] },
    },
  },
};

const SYSTEM_PROMPT = `You read advice letters issued by a state ethics commission.
Identify the question the requester asked and the commission's conclusion.
Copy verbatim text into "question" and "conclusion" only when it appears in the letter.
Put your own restatements in "question_synthetic" and "conclusion_synthetic".
Never invent facts that are not in the letter.`;

export interface OpenAiSyntheticOptions {
  model?: string;
  apiKey?: string;
  timeoutMs?: number;
  client?: OpenAI;
}

export class OpenAiSyntheticGenerator implements SyntheticSectionGenerator {
  private readonly model: string;
  private readonly openai: OpenAI;

  constructor(options: OpenAiSyntheticOptions = {}) {
    this.model = options.model ?? config.llmModelSynthetic;
    this.openai =
      options.client ??
      new OpenAI({
        apiKey: options.apiKey || process.env.OPENAI_API_KEY || config.openaiApiKey,
        timeout: options.timeoutMs ?? config.engineTimeoutMs,
        maxRetries: 0, // Disable SDK retries - let BullMQ handle retries at job level
      });
  }

  async generate(request: SyntheticSectionRequest): Promise<SyntheticSectionResult> {
    const startTime = Date.now();

    logger.info('Generating synthetic sections', {
      model: this.model,
      document_id: request.documentId,
      parser_confidence: request.sections.extraction_confidence,
      text_length: request.text.length,
    });

    try {
      const response = await this.openai.chat.completions.create({
        model: this.model,
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          {
            role: 'user',
            content: `Letter ${request.documentId}:\n\n${request.text.slice(0, MAX_INPUT_CHARS)}`,
          },
        ],
        response_format: {
          type: 'json_schema',
          json_schema: SYNTHETIC_SECTIONS_SCHEMA,
        },
        temperature: 0,
      });

      const content = response.choices[0]?.message?.content;
      if (!content) {
        throw new Error('Empty response from OpenAI');
      }

      const validation = validateSyntheticSections(JSON.parse(content));
      if (!validation.valid) {
        throw new Error(`Generator response failed validation: ${validation.errors.join('; ')}`);
      }

      const cost = usageCost(response.usage?.prompt_tokens ?? 0, response.usage?.completion_tokens ?? 0);
      logger.info('Synthetic sections complete', {
        model: this.model,
        request_id: response.id,
        duration_ms: Date.now() - startTime,
        tokens_used: response.usage?.total_tokens,
        confidence: validation.value.extraction_confidence,
      });

      return { ...validation.value, cost, model: this.model };
    } catch (error) {
      logger.error('Synthetic section generation failed', error, {
        model: this.model,
        document_id: request.documentId,
        duration_ms: Date.now() - startTime,
      });
      throw error;
    }
  }
}
