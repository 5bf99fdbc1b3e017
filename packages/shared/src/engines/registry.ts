/**
 * Engine Registry
 *
 * Registry pattern for extraction engines, keyed by the role each engine
 * fills. Services register their concrete adapters at startup; tests register
 * in-process fakes.
 */

import type { EngineRole, ExtractionEngine } from './types';
import { UnknownEngine } from '../errors';
import { logger } from '../logger';

export class EngineRegistry {
  private readonly engines = new Map<EngineRole, ExtractionEngine>();

  /**
   * Register an engine for its role.
   * Overwrites any existing engine for that role.
   */
  register(engine: ExtractionEngine): this {
    this.engines.set(engine.role, engine);

    logger.debug('Registered engine', {
      role: engine.role,
      method: engine.method,
      pass: engine.pass,
      description: engine.description,
    });
    return this;
  }

  get(role: EngineRole): ExtractionEngine | undefined {
    return this.engines.get(role);
  }

  /**
   * @throws UnknownEngine if no engine is registered for the role
   */
  getOrThrow(role: EngineRole): ExtractionEngine {
    const engine = this.engines.get(role);
    if (!engine) {
      throw new UnknownEngine(role);
    }
    return engine;
  }

  has(role: EngineRole): boolean {
    return this.engines.has(role);
  }

  roles(): EngineRole[] {
    return Array.from(this.engines.keys());
  }

  /** Useful for testing */
  clear(): void {
    this.engines.clear();
  }
}

/** Process-wide registry used by the worker */
export const engineRegistry = new EngineRegistry();
