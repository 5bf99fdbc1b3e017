/**
 * Extraction Orchestrator
 *
 * Walks the escalation ladder for one document: text layer first, then
 * baseline OCR and vision transcription when the cheaper output looks like a
 * scan. Picks the best usable attempt, routes vision output through the
 * fidelity verifier and the constrained remediation pass, and returns the
 * full record. Persistence is the caller's job.
 */

import type {
  EscalationReason,
  ExtractionAttempt,
  ExtractionMethod,
  ExtractionRecord,
  FidelityAssessment,
  RegistryEntry,
  RiskTier,
} from '../types';
import type { EngineRole } from '../engines/types';
import { EngineRegistry, engineRegistry } from '../engines/registry';
import { config } from '../config';
import { logger } from '../logger';
import { isPipelineError } from '../errors';
import { fidelityTierCounter } from '../metrics';
import { escalationReasons, escalationSettingsFromConfig, scoreQuality, type EscalationSettings } from '../quality/scorer';
import {
  fidelityThresholdsFromConfig,
  nativeTrusted,
  replacedAssessment,
  verify,
  type FidelityThresholds,
} from '../fidelity/verifier';

export interface OrchestratorOptions {
  minUsableWords?: number;
  escalation?: EscalationSettings;
  thresholds?: FidelityThresholds;
}

/** Lower is cheaper; ties in selection go to the cheaper engine */
const METHOD_COST_RANK: Record<ExtractionMethod, number> = {
  'text-layer': 0,
  'baseline-ocr': 1,
  'vision-transcription': 2,
};

const TIER_RANK: Record<RiskTier, number> = {
  verified: 0,
  low: 1,
  medium: 2,
  high: 3,
  critical: 4,
};

/**
 * Best attempt by word count, then quality score, then engine cost.
 * Returns null when nothing reaches the usable word floor.
 */
export function selectBest(
  attempts: readonly ExtractionAttempt[],
  minUsableWords: number = config.minUsableWords
): ExtractionAttempt | null {
  let best: ExtractionAttempt | null = null;
  for (const attempt of attempts) {
    if (attempt.word_count < minUsableWords) continue;
    if (
      !best ||
      attempt.word_count > best.word_count ||
      (attempt.word_count === best.word_count && attempt.quality_score > best.quality_score) ||
      (attempt.word_count === best.word_count &&
        attempt.quality_score === best.quality_score &&
        METHOD_COST_RANK[attempt.method] < METHOD_COST_RANK[best.method])
    ) {
      best = attempt;
    }
  }
  return best;
}

interface Selection {
  current: ExtractionAttempt | null;
  fidelity: FidelityAssessment | null;
}

export class ExtractionOrchestrator {
  private readonly minUsableWords: number;
  private readonly escalation: EscalationSettings;
  private readonly thresholds: FidelityThresholds;

  constructor(
    private readonly engines: EngineRegistry = engineRegistry,
    options: OrchestratorOptions = {}
  ) {
    this.minUsableWords = options.minUsableWords ?? config.minUsableWords;
    this.escalation = options.escalation ?? escalationSettingsFromConfig();
    this.thresholds = options.thresholds ?? fidelityThresholdsFromConfig();
  }

  async extract(entry: RegistryEntry): Promise<ExtractionRecord> {
    const attempts: ExtractionAttempt[] = [];
    const notes: string[] = [];

    const textLayer = await this.tryEngine('text-layer', entry, attempts, notes);

    const reasons = this.escalationFor(entry, textLayer);
    let baseline: ExtractionAttempt | null = null;
    if (reasons.length > 0) {
      notes.push(`Escalated: ${reasons.join(', ')}`);
      baseline = await this.tryEngine('baseline-ocr', entry, attempts, notes);
      if (baseline) {
        await this.tryEngine('vision-transcription', entry, attempts, notes);
      } else if (this.engines.has('vision-transcription')) {
        notes.push('vision-transcription skipped: no baseline witness');
      }
    }

    const standard = attempts.filter((a) => a.pass === 'standard');
    let selection: Selection = { current: null, fidelity: null };
    const winner = selectBest(standard, this.minUsableWords);

    if (winner && winner.method === 'vision-transcription') {
      if (baseline) {
        selection = await this.routeVision(winner, baseline, standard, entry, attempts, notes);
      } else {
        notes.push('Vision attempt without baseline witness not selected');
        selection = this.bestNative(standard);
      }
    } else if (winner) {
      selection = { current: winner, fidelity: nativeTrusted(winner) };
    }

    if (selection.fidelity) {
      fidelityTierCounter.inc({
        tier: selection.fidelity.risk_tier,
        method: selection.current?.method ?? 'none',
      });
    }

    const record: ExtractionRecord = {
      status: selection.current ? 'extracted' : 'extraction_failed',
      current: selection.current,
      fidelity: selection.fidelity,
      attempts,
      page_count: attempts.reduce((max, a) => Math.max(max, a.page_count), 0),
      escalation_reasons: reasons,
      notes,
      total_cost: attempts.reduce((sum, a) => sum + (a.cost ?? 0), 0),
    };

    if (!selection.current) {
      notes.push(`No attempt reached ${this.minUsableWords} words`);
      logger.warn('Extraction failed', {
        registry_key: entry.registry_key,
        attempts: attempts.map((a) => ({ method: a.method, words: a.word_count })),
      });
    } else {
      logger.info('Extraction selected', {
        registry_key: entry.registry_key,
        method: selection.current.method,
        pass: selection.current.pass,
        word_count: selection.current.word_count,
        quality_score: selection.current.quality_score,
        risk_tier: selection.fidelity?.risk_tier,
        attempts: attempts.length,
      });
    }

    return record;
  }

  private escalationFor(entry: RegistryEntry, textLayer: ExtractionAttempt | null): EscalationReason[] {
    const metrics = textLayer
      ? scoreQuality(textLayer.text, textLayer.page_count)
      : scoreQuality('', 0);
    return escalationReasons(entry.year, metrics, this.escalation);
  }

  /**
   * `low` is accepted. Anything worse gets the constrained pass; a pass that
   * verifies `low` replaces the flagged output. Output still `critical`
   * afterwards is demoted in favour of the best native attempt.
   */
  private async routeVision(
    vision: ExtractionAttempt,
    baseline: ExtractionAttempt,
    standard: readonly ExtractionAttempt[],
    entry: RegistryEntry,
    attempts: ExtractionAttempt[],
    notes: string[]
  ): Promise<Selection> {
    const assessment = verify(vision, baseline, this.thresholds);
    notes.push(`Vision fidelity ${assessment.risk_tier} (canary ${assessment.canary_score})`);

    if (assessment.risk_tier === 'low') {
      return { current: vision, fidelity: assessment };
    }

    let current = vision;
    let fidelity = assessment;

    if (this.engines.has('constrained-transcription')) {
      const remediated = await this.tryEngine('constrained-transcription', entry, attempts, notes);
      if (remediated && remediated.word_count >= this.minUsableWords) {
        const recheck = verify(remediated, baseline, this.thresholds);
        notes.push(`Constrained pass fidelity ${recheck.risk_tier} (canary ${recheck.canary_score})`);
        if (recheck.risk_tier === 'low') {
          return { current: remediated, fidelity: replacedAssessment(recheck, assessment) };
        }
        if (TIER_RANK[recheck.risk_tier] <= TIER_RANK[assessment.risk_tier]) {
          current = remediated;
          fidelity = recheck;
        }
      } else if (remediated) {
        notes.push('Constrained pass produced too little text');
      }
    } else {
      notes.push('No constrained-transcription engine registered');
    }

    if (fidelity.risk_tier === 'critical') {
      const fallback = this.bestNative(standard);
      notes.push(`Demoted critical vision transcription ${current.attempt_id}`);
      logger.warn('Vision transcription demoted', {
        registry_key: entry.registry_key,
        attempt_id: current.attempt_id,
        canary_score: fidelity.canary_score,
        description_mode: fidelity.description_mode,
        fallback: fallback.current?.method ?? null,
      });
      return fallback;
    }

    return { current, fidelity };
  }

  private bestNative(standard: readonly ExtractionAttempt[]): Selection {
    const native = selectBest(
      standard.filter((a) => a.method !== 'vision-transcription'),
      this.minUsableWords
    );
    return native ? { current: native, fidelity: nativeTrusted(native) } : { current: null, fidelity: null };
  }

  /**
   * Run one engine. A failed or missing engine becomes a note; only the
   * document's outcome as a whole can fail.
   */
  private async tryEngine(
    role: EngineRole,
    entry: RegistryEntry,
    attempts: ExtractionAttempt[],
    notes: string[]
  ): Promise<ExtractionAttempt | null> {
    const engine = this.engines.get(role);
    if (!engine) {
      notes.push(`${role} skipped: no engine registered`);
      return null;
    }

    try {
      const attempt = await engine.attempt(entry.source, { registryKey: entry.registry_key, year: entry.year });
      attempts.push(attempt);
      return attempt;
    } catch (error) {
      if (!isPipelineError(error)) throw error;
      notes.push(`${role} failed: ${error.message}`);
      return null;
    }
  }
}
