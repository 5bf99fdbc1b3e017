/**
 * Shared Domain Types
 *
 * Types that cross module boundaries: the upstream registry entry, extraction
 * attempts and records, fidelity assessments, structured fields and the
 * persisted document record.
 */

// ============================================================================
// Upstream (crawler / downloader)
// ============================================================================

/**
 * Reference to the immutable source asset supplied by the downloader.
 * Page images are pre-rendered upstream; the text layer is read from the PDF.
 */
export interface SourceAsset {
  pdfPath: string | null;
  pageImages: string[];
}

export interface RegistryMetadata {
  title?: string | null;
  letterDate?: string | null;
  requestorName?: string | null;
  city?: string | null;
}

export interface RegistryEntry {
  /** Stable key assigned by the crawler */
  registry_key: string;
  /** Identifier from listing metadata, frequently missing or denormalized */
  letter_id: string | null;
  year: number | null;
  source_reference: string;
  source: SourceAsset;
  metadata: RegistryMetadata;
}

// ============================================================================
// Extraction
// ============================================================================

export type ExtractionMethod = 'text-layer' | 'baseline-ocr' | 'vision-transcription';

/** Standard transcription, or the verbatim-only remediation pass */
export type TranscriptionPass = 'standard' | 'constrained';

export type ExtractionAttempt = Readonly<{
  attempt_id: string;
  method: ExtractionMethod;
  pass: TranscriptionPass;
  text: string;
  pages: readonly string[];
  page_count: number;
  word_count: number;
  quality_score: number;
  cost: number | null;
  model: string | null;
  duration_ms: number;
  created_at: string;
}>;

export type RiskTier = 'verified' | 'low' | 'medium' | 'high' | 'critical';

export type FidelityMethod = 'native-trusted' | 'baseline-compared' | 'replaced';

export type FidelityAssessment = Readonly<{
  canary_score: number;
  risk_tier: RiskTier;
  method: FidelityMethod;
  description_mode: boolean;
  candidate_attempt_id: string;
  baseline_attempt_id: string | null;
  notes: readonly string[];
}>;

export type ExtractionStatus = 'extracted' | 'extraction_failed';

export type EscalationReason =
  | 'pre_threshold_year'
  | 'low_quality'
  | 'low_density'
  | 'low_alpha_ratio'
  | 'garbage_words';

export interface ExtractionRecord {
  status: ExtractionStatus;
  current: ExtractionAttempt | null;
  fidelity: FidelityAssessment | null;
  attempts: ExtractionAttempt[];
  page_count: number;
  escalation_reasons: EscalationReason[];
  notes: string[];
  total_cost: number;
}

// ============================================================================
// Structure
// ============================================================================

export type SectionType = 'question' | 'conclusion' | 'facts' | 'analysis';

export type SectionExtractionMethod = 'regex' | 'regex_validated' | 'none' | 'llm';

export interface SectionResult {
  question: string | null;
  conclusion: string | null;
  facts: string | null;
  analysis: string | null;
  extraction_method: SectionExtractionMethod;
  extraction_confidence: number;
  has_standard_format: boolean;
  parsing_notes: string | null;
}

export interface CitationSet {
  statute: string[];
  regulation: string[];
  prior_decision: string[];
  external: string[];
  /** Written only by the citation graph pass */
  cited_by: string[];
}

export type Topic = 'conflicts_of_interest' | 'campaign_finance' | 'lobbying' | 'other';

export type ClassificationReason = 'plurality' | 'no_matching_ranges' | 'no_citations';

export interface Classification {
  topic: Topic | null;
  confidence: number | null;
  method: 'heuristic:citation_based';
  reason: ClassificationReason;
}

export type DocumentType = 'advice_letter' | 'informal_advice' | 'opinion' | 'correspondence';

export type IdSource = 'registry' | 'recovered' | 'placeholder';

// ============================================================================
// Persisted record
// ============================================================================

export interface DocumentRecord {
  schema_version: '1.0';
  id: string;
  id_source: IdSource;
  registry_key: string;
  year: number | null;
  source_reference: string;
  extraction: {
    status: ExtractionStatus;
    method: ExtractionMethod | null;
    pass: TranscriptionPass | null;
    page_count: number;
    word_count: number;
    char_count: number;
    quality_score: number;
    cost: number;
    attempt_count: number;
    escalation_reasons: EscalationReason[];
    notes: string[];
    extracted_at: string;
  };
  fidelity: {
    risk_tier: RiskTier;
    canary_score: number;
    method: FidelityMethod;
    description_mode: boolean;
    notes: string[];
  } | null;
  content: {
    full_text: string;
  };
  parsed: {
    date: string | null;
    date_raw: string | null;
    requestor_name: string | null;
    requestor_title: string | null;
    requestor_city: string | null;
    document_type: DocumentType;
  };
  sections: SectionResult & {
    question_synthetic: string | null;
    conclusion_synthetic: string | null;
  };
  citations: CitationSet & {
    notes: string[];
  };
  classification: Classification;
  embedding: {
    qa_text: string;
    qa_source: 'extracted' | 'synthetic' | 'mixed';
    first_500_words: string;
    summary: string | null;
  };
  processed_at: string;
}

export interface KnownGap {
  identifier: string;
  cited_by_count: number;
  example_citing: string[];
}

// ============================================================================
// Read API
// ============================================================================

export interface ErrorEnvelope {
  error: {
    code: 'not_found' | 'invalid_request' | 'internal_error';
    message: string;
    correlation_id: string;
  };
}

export interface DocumentListResponse {
  items: DocumentRecord[];
  count: number;
}
