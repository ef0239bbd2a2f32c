/**
 * AsyncLocalStorage Context Management
 *
 * Provides correlation ID propagation across API requests and worker jobs
 * using Node.js AsyncLocalStorage.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ulid } from 'ulid';

export interface RequestContext {
  correlationId: string;
  runId?: string;
  documentName?: string;
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
 * Run a function within a new AsyncLocalStorage context
 */
export function runWithContext<T>(context: RequestContext, fn: () => T): T {
  return asyncLocalStorage.run(context, fn);
}

/**
 * Run an async function within a new AsyncLocalStorage context
 */
export async function runWithContextAsync<T>(
  context: RequestContext,
  fn: () => Promise<T>
): Promise<T> {
  return asyncLocalStorage.run(context, fn);
}

/**
 * Run an async function in a child of the current context, overriding
 * the given fields (used to tag log lines with the document being parsed).
 */
export async function withContextFields<T>(
  fields: Partial<RequestContext>,
  fn: () => Promise<T>
): Promise<T> {
  const parent = getContext();
  const context: RequestContext = {
    correlationId: parent?.correlationId || ulid(),
    runId: parent?.runId,
    documentName: parent?.documentName,
    ...fields,
  };
  return asyncLocalStorage.run(context, fn);
}

export { asyncLocalStorage };
