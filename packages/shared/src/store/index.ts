export type { CommitResult, DocumentStore, RecordFilter, CitationGraphWrite } from './types';
export { MemoryDocumentStore } from './memory-store';
export { PgDocumentStore, createPool } from './pg-store';
