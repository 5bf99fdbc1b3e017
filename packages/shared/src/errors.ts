/**
 * Pipeline Error Taxonomy
 *
 * Typed errors with stable codes. Per-document errors are caught by the
 * pipeline and recorded; only CostCeilingExceeded halts a batch.
 */

export const PipelineErrorCode = {
  EXTRACTION_FAILED: 'EXTRACTION_FAILED',
  SERVICE_TIMEOUT: 'SERVICE_TIMEOUT',
  ENGINE_FAILED: 'ENGINE_FAILED',
  QUALITY_REGRESSION: 'QUALITY_REGRESSION',
  COST_CEILING_EXCEEDED: 'COST_CEILING_EXCEEDED',
  INVALID_RECORD: 'INVALID_RECORD',
  UNKNOWN_ENGINE: 'UNKNOWN_ENGINE',
  DUPLICATE_DOCUMENT_ID: 'DUPLICATE_DOCUMENT_ID',
} as const;

export type PipelineErrorCodeType = (typeof PipelineErrorCode)[keyof typeof PipelineErrorCode];

export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly code: PipelineErrorCodeType,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'PipelineError';
    Object.setPrototypeOf(this, PipelineError.prototype);
  }
}

/** No engine produced usable text for a document. */
export class ExtractionFailure extends PipelineError {
  constructor(registryKey: string, details?: Record<string, unknown>) {
    super(`No engine produced usable text for ${registryKey}`, PipelineErrorCode.EXTRACTION_FAILED, {
      registryKey,
      ...details,
    });
    this.name = 'ExtractionFailure';
    Object.setPrototypeOf(this, ExtractionFailure.prototype);
  }
}

export class ServiceTimeout extends PipelineError {
  constructor(label: string, timeoutMs: number) {
    super(`${label} exceeded ${timeoutMs}ms`, PipelineErrorCode.SERVICE_TIMEOUT, { label, timeoutMs });
    this.name = 'ServiceTimeout';
    Object.setPrototypeOf(this, ServiceTimeout.prototype);
  }
}

/** An engine exhausted its retries. The engine failed, not the document. */
export class EngineFailure extends PipelineError {
  constructor(engine: string, cause: unknown) {
    super(
      `Engine ${engine} failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      PipelineErrorCode.ENGINE_FAILED,
      {
        engine,
        causeCode: cause instanceof PipelineError ? cause.code : undefined,
      }
    );
    this.name = 'EngineFailure';
    Object.setPrototypeOf(this, EngineFailure.prototype);
  }
}

export class QualityRegression extends PipelineError {
  constructor(documentId: string, currentScore: number, candidateScore: number) {
    super(
      `Candidate for ${documentId} scored ${candidateScore.toFixed(3)}, below current ${currentScore.toFixed(3)}`,
      PipelineErrorCode.QUALITY_REGRESSION,
      { documentId, currentScore, candidateScore }
    );
    this.name = 'QualityRegression';
    Object.setPrototypeOf(this, QualityRegression.prototype);
  }
}

export class CostCeilingExceeded extends PipelineError {
  constructor(runId: string, spentUsd: number, ceilingUsd: number) {
    super(
      `Run ${runId} spent $${spentUsd.toFixed(4)}, ceiling is $${ceilingUsd.toFixed(2)}`,
      PipelineErrorCode.COST_CEILING_EXCEEDED,
      { runId, spentUsd, ceilingUsd }
    );
    this.name = 'CostCeilingExceeded';
    Object.setPrototypeOf(this, CostCeilingExceeded.prototype);
  }
}

export class InvalidRecord extends PipelineError {
  constructor(documentId: string, errors: string[]) {
    super(`Record ${documentId} failed schema validation`, PipelineErrorCode.INVALID_RECORD, {
      documentId,
      errors,
    });
    this.name = 'InvalidRecord';
    Object.setPrototypeOf(this, InvalidRecord.prototype);
  }
}

export class UnknownEngine extends PipelineError {
  constructor(role: string) {
    super(`No engine registered for role: ${role}`, PipelineErrorCode.UNKNOWN_ENGINE, { role });
    this.name = 'UnknownEngine';
    Object.setPrototypeOf(this, UnknownEngine.prototype);
  }
}

/** Another registry entry already holds the identifier a document resolved to. */
export class DuplicateDocumentId extends PipelineError {
  constructor(documentId: string, registryKey: string, heldBy: string | null) {
    super(`Identifier ${documentId} already held by ${heldBy ?? 'another entry'}`, PipelineErrorCode.DUPLICATE_DOCUMENT_ID, {
      documentId,
      registryKey,
      heldBy,
    });
    this.name = 'DuplicateDocumentId';
    Object.setPrototypeOf(this, DuplicateDocumentId.prototype);
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}
