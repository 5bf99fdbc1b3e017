/**
 * Extraction Engines Module
 *
 * Concrete adapters (pdf text layer, OCR, vision transcription) live with the
 * worker that owns their native dependencies; this module holds the contract,
 * the base class and the registry.
 */

export type { EngineRole, EngineContext, EngineOutput, ExtractionEngine, EngineCallOptions } from './types';
export { BaseEngine, PAGE_SEPARATOR } from './base-engine';
export { EngineRegistry, engineRegistry } from './registry';
