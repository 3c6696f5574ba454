/**
 * Request context
 *
 * Each HTTP request runs inside its own store so that the logger and the
 * error envelope can read the correlation ID without threading it through
 * every pipeline call.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ulid } from 'ulid';

export interface RequestContext {
  correlationId: string;
  filename?: string;
}

const asyncLocalStorage = new AsyncLocalStorage<RequestContext>();

export function getContext(): RequestContext | undefined {
  return asyncLocalStorage.getStore();
}

/**
 * Correlation ID of the active request; outside a request a fresh ID is minted.
 */
export function getCorrelationId(): string {
  const context = getContext();
  return context?.correlationId || ulid();
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

/**
 * Attach the document filename to the active context, if there is one.
 */
export function setContextFilename(filename: string): void {
  const context = getContext();
  if (context) {
    context.filename = filename;
  }
}
