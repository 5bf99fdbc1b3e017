/**
 * AsyncLocalStorage Context Management
 *
 * Carries the correlation ID, run ID and document key through a job so that
 * every log line written while a document is processed can be tied back to it.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ulid } from 'ulid';

export interface RequestContext {
  correlationId: string;
  runId?: string;
  registryKey?: string;
  documentId?: string;
}

const asyncLocalStorage = new AsyncLocalStorage<RequestContext>();

/**
 * Get the current request context
 */
export function getContext(): RequestContext | undefined {
  return asyncLocalStorage.getStore();
}

/**
 * Get the correlation ID from the current context, or generate a new one
 */
export function getCorrelationId(): string {
  const context = getContext();
  return context?.correlationId || ulid();
}

/**
 * Record the resolved document identifier on the active context.
 * The identifier is often only known after extraction.
 */
export function setContextDocumentId(documentId: string): void {
  const context = getContext();
  if (context) {
    context.documentId = documentId;
  }
}

export function runWithContext<T>(context: RequestContext, fn: () => T): T {
  return asyncLocalStorage.run(context, fn);
}

export async function runWithContextAsync<T>(
  context: RequestContext,
  fn: () => Promise<T>
): Promise<T> {
  return asyncLocalStorage.run(context, fn);
}
