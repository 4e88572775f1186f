/**
 * AsyncLocalStorage Context Management
 *
 * Provides correlation ID propagation across batch runs, per-document work
 * and review API requests using Node.js AsyncLocalStorage.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ulid } from 'ulid';

export interface RunContext {
  correlationId: string;
  runId?: string;
  projectName?: string;
  providerIndex?: number;
  documentPath?: string;
}

const asyncLocalStorage = new AsyncLocalStorage<RunContext>();

/**
 * Get the current run context
 */
export function getContext(): RunContext | undefined {
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
export function runWithContext<T>(context: RunContext, fn: () => T): T {
  return asyncLocalStorage.run(context, fn);
}

/**
 * Run an async function within a new AsyncLocalStorage context
 */
export async function runWithContextAsync<T>(
  context: RunContext,
  fn: () => Promise<T>
): Promise<T> {
  return asyncLocalStorage.run(context, fn);
}

/**
 * Run an async function in a child context that inherits the current one
 */
export async function withChildContext<T>(
  patch: Partial<RunContext>,
  fn: () => Promise<T>
): Promise<T> {
  const parent = getContext();
  return asyncLocalStorage.run(
    { ...parent, ...patch, correlationId: patch.correlationId || parent?.correlationId || ulid() },
    fn
  );
}

export { asyncLocalStorage };
