/**
 * Registers the concrete engine adapters for the worker process.
 */

import { config, engineRegistry, logger, type EngineRegistry } from '@advice-corpus/shared';
import { TextLayerEngine } from './pdf';
import { BaselineOcrEngine } from './ocr';
import { ConstrainedTranscriptionEngine, VisionTranscriptionEngine } from './llm';

export interface RegisteredEngines {
  registry: EngineRegistry;
  ocr: BaselineOcrEngine;
}

export function registerEngines(registry: EngineRegistry = engineRegistry): RegisteredEngines {
  const ocr = new BaselineOcrEngine();
  registry.register(new TextLayerEngine()).register(ocr);

  if (config.openaiApiKey) {
    registry.register(new VisionTranscriptionEngine()).register(new ConstrainedTranscriptionEngine());
  } else {
    logger.warn('OPENAI_API_KEY not set, vision transcription disabled');
  }

  return { registry, ocr };
}
