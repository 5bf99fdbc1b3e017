/**
 * JSON Schema Validation
 *
 * Schema validation using Ajv for persisted document records and for the
 * structured responses of the synthetic section generator, and for the
 * registry entries handed over by the crawler.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import type { ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import { logger } from './logger';
import type { DocumentRecord, DocumentType, RegistryEntry } from './types';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false, // Allow additional keywords from JSON Schema draft
  allErrors: true,
});
addFormats(ajv);

function loadSchema(schemaName: string): object {
  // Try multiple paths for schema resolution
  const possiblePaths = [
    // Relative to shared package sources
    path.join(__dirname, '../../../docs/contracts', schemaName),
    // Relative to compiled output under dist/packages/shared/src
    path.join(__dirname, '../../../../docs/contracts', schemaName),
    // Relative to project root (for Docker containers)
    path.join(process.cwd(), 'docs/contracts', schemaName),
  ];

  for (const schemaPath of possiblePaths) {
    if (fs.existsSync(schemaPath)) {
      const parsed: unknown = JSON.parse(fs.readFileSync(schemaPath, 'utf-8'));
      if (typeof parsed === 'object' && parsed !== null) {
        return parsed;
      }
      throw new Error(`Schema ${schemaPath} is not a JSON object`);
    }
  }

  throw new Error(`Schema file not found: ${schemaName}`);
}

/** Response of the synthetic section generator */
export interface SyntheticSectionsPayload {
  document_type: DocumentType;
  question: string | null;
  question_synthetic: string | null;
  conclusion: string | null;
  conclusion_synthetic: string | null;
  summary: string | null;
  extraction_confidence: number;
  notes: string | null;
}

// Compiled lazily on first use
let documentRecordValidator: ValidateFunction<DocumentRecord> | null = null;
let syntheticSectionsValidator: ValidateFunction<SyntheticSectionsPayload> | null = null;
let registryEntryValidator: ValidateFunction<RegistryEntry> | null = null;

function getDocumentRecordValidator(): ValidateFunction<DocumentRecord> {
  if (!documentRecordValidator) {
    documentRecordValidator = ajv.compile<DocumentRecord>(loadSchema('document_record.schema.json'));
  }
  return documentRecordValidator;
}

function getSyntheticSectionsValidator(): ValidateFunction<SyntheticSectionsPayload> {
  if (!syntheticSectionsValidator) {
    syntheticSectionsValidator = ajv.compile<SyntheticSectionsPayload>(
      loadSchema('synthetic_sections.schema.json')
    );
  }
  return syntheticSectionsValidator;
}

function getRegistryEntryValidator(): ValidateFunction<RegistryEntry> {
  if (!registryEntryValidator) {
    registryEntryValidator = ajv.compile<RegistryEntry>(loadSchema('registry_entry.schema.json'));
  }
  return registryEntryValidator;
}

export type ValidationResult<T> = { valid: true; value: T } | { valid: false; errors: string[] };

function run<T>(validate: ValidateFunction<T>, data: unknown, label: string): ValidationResult<T> {
  if (validate(data)) {
    return { valid: true, value: data };
  }
  const errors = (validate.errors ?? []).map((e) => `${e.instancePath || '/'}: ${e.message ?? 'invalid'}`);
  logger.warn(`${label} validation failed`, { errors });
  return { valid: false, errors };
}

/**
 * Validate a DocumentRecord against document_record.schema.json
 */
export function validateDocumentRecord(data: unknown): ValidationResult<DocumentRecord> {
  return run(getDocumentRecordValidator(), data, 'DocumentRecord');
}

/**
 * Validate a parsed generator response against synthetic_sections.schema.json
 */
export function validateSyntheticSections(data: unknown): ValidationResult<SyntheticSectionsPayload> {
  return run(getSyntheticSectionsValidator(), data, 'SyntheticSections');
}

/**
 * Validate a crawler registry entry against registry_entry.schema.json
 */
export function validateRegistryEntry(data: unknown): ValidationResult<RegistryEntry> {
  return run(getRegistryEntryValidator(), data, 'RegistryEntry');
}
