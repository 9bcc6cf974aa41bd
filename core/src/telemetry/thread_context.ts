/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {AsyncLocalStorageContextManager} from '@opentelemetry/context-async-hooks';
import {
  type Context,
  ROOT_CONTEXT,
  context,
  createContextKey,
} from '@opentelemetry/api';

/** Span attribute LangSmith groups traces by. */
export const THREAD_ID_SPAN_ATTRIBUTE = 'langsmith.metadata.thread_id';

const THREAD_ID_CONTEXT_KEY = createContextKey('a2a_relay.thread_id');

export function setThreadId(ctx: Context, threadId: string): Context {
  return ctx.setValue(THREAD_ID_CONTEXT_KEY, threadId);
}

/**
 * Thread id of the request being served, if its body carried one.
 *
 * Only set while a request runs inside the thread tracing middleware; reads
 * from other requests never see it.
 */
export function getActiveThreadId(ctx: Context = context.active()): string | undefined {
  const value = ctx.getValue(THREAD_ID_CONTEXT_KEY);
  return typeof value === 'string' ? value : undefined;
}

/**
 * Registers an AsyncLocalStorage context manager unless one that propagates
 * context is already in place (a registered tracer provider brings its own).
 */
export function ensureContextPropagation(): void {
  const marked = setThreadId(ROOT_CONTEXT, 'propagation-check');
  if (context.with(marked, () => context.active() === marked)) {
    return;
  }
  context.setGlobalContextManager(new AsyncLocalStorageContextManager().enable());
}
