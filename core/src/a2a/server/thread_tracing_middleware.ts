/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {SpanKind, SpanStatusCode, context, trace} from '@opentelemetry/api';
import type {ErrorRequestHandler, Request, RequestHandler} from 'express';

import type {TracingHandle} from '../../telemetry/setup.js';
import {
  THREAD_ID_SPAN_ATTRIBUTE,
  ensureContextPropagation,
  setThreadId,
} from '../../telemetry/thread_context.js';
import {logger} from '../../utils/logger.js';
import {threadMetadataEnvelopeSchema} from '../schemas.js';

/**
 * Reads the thread id from a raw JSON-RPC body: `metadata.thread_id`,
 * else `params.metadata.thread_id`. Anything unreadable yields undefined.
 */
export function extractThreadId(body: unknown): string | undefined {
  if (!Buffer.isBuffer(body) && typeof body !== 'string') {
    return undefined;
  }
  const text = body.toString();
  if (!text) {
    return undefined;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    logger.debug('Request body is not JSON; no thread id');
    return undefined;
  }

  const parsed = threadMetadataEnvelopeSchema.safeParse(raw);
  if (!parsed.success) {
    return undefined;
  }
  return (
    parsed.data.metadata?.thread_id ?? parsed.data.params?.metadata?.thread_id
  );
}

/** Marks the span of a request as failed. */
type FailRequestSpan = (error: unknown) => void;

const requestSpans = new WeakMap<Request, FailRequestSpan>();

export interface ThreadTracingOptions {
  tracing: TracingHandle;
  agentName: string;
}

/**
 * Opens an `invoke_agent` span around each request and, when the body
 * carries a thread id, tags the span with it and makes it readable through
 * `getActiveThreadId()` for the rest of the request.
 *
 * Must run after a raw body parser; the buffered body stays in `req.body`
 * for the handlers that follow. Register
 * {@link createThreadTracingErrorHandler} after the routes so a failing
 * handler marks the span.
 */
export function createThreadTracingMiddleware({
  tracing,
  agentName,
}: ThreadTracingOptions): RequestHandler {
  ensureContextPropagation();

  return (req, res, next) => {
    const threadId = extractThreadId(req.body);
    const span = tracing.tracer.startSpan(`invoke_agent ${agentName}`, {
      kind: SpanKind.SERVER,
      attributes: {
        'http.request.method': req.method,
        'url.path': req.path,
      },
    });
    if (threadId) {
      span.setAttribute(THREAD_ID_SPAN_ATTRIBUTE, threadId);
    }

    let ended = false;
    let failed = false;
    const endSpan = () => {
      if (ended) return;
      ended = true;
      span.setAttribute('http.response.status_code', res.statusCode);
      if (!failed && res.statusCode >= 500) {
        span.setStatus({code: SpanStatusCode.ERROR});
      }
      span.end();
    };
    res.once('finish', endSpan);
    res.once('close', endSpan);
    requestSpans.set(req, (error) => {
      failed = true;
      span.recordException(error instanceof Error ? error : String(error));
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: error instanceof Error ? error.message : String(error),
      });
    });

    let ctx = trace.setSpan(context.active(), span);
    if (threadId) {
      ctx = setThreadId(ctx, threadId);
    }
    context.with(ctx, () => next());
  };
}

/**
 * Records an error raised by a later handler on the request span, then
 * passes it on to express.
 */
export function createThreadTracingErrorHandler(): ErrorRequestHandler {
  return (err: unknown, req, _res, next) => {
    requestSpans.get(req)?.(err);
    next(err);
  };
}
