/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {type Tracer, trace} from '@opentelemetry/api';

import {logger} from '../utils/logger.js';

export const TRACER_NAME = 'a2a-relay';

export interface TracingConfig {
  /** `service.name` resource attribute. */
  serviceName: string;
  /** LangSmith project spans are filed under. */
  projectName: string;
  /** LangSmith API key. Tracing stays local without it. */
  apiKey?: string;
  /** LangSmith base URL, e.g. https://api.smith.langchain.com */
  endpoint: string;
}

export interface TracingHandle {
  readonly tracer: Tracer;
  /** Whether spans are exported. */
  readonly enabled: boolean;
  shutdown(): Promise<void>;
}

export interface TracingSdk {
  NodeTracerProvider: typeof import('@opentelemetry/sdk-trace-node').NodeTracerProvider;
  BatchSpanProcessor: typeof import('@opentelemetry/sdk-trace-base').BatchSpanProcessor;
  OTLPTraceExporter: typeof import('@opentelemetry/exporter-trace-otlp-http').OTLPTraceExporter;
  resourceFromAttributes: typeof import('@opentelemetry/resources').resourceFromAttributes;
}

export type TracingSdkLoader = () => Promise<TracingSdk>;

/**
 * Loads the OpenTelemetry SDK packages on first use.
 */
export async function importTracingSdk(): Promise<TracingSdk> {
  const [node, base, otlp, resources] = await Promise.all([
    import('@opentelemetry/sdk-trace-node'),
    import('@opentelemetry/sdk-trace-base'),
    import('@opentelemetry/exporter-trace-otlp-http'),
    import('@opentelemetry/resources'),
  ]);
  return {
    NodeTracerProvider: node.NodeTracerProvider,
    BatchSpanProcessor: base.BatchSpanProcessor,
    OTLPTraceExporter: otlp.OTLPTraceExporter,
    resourceFromAttributes: resources.resourceFromAttributes,
  };
}

/**
 * A handle whose spans go to whatever provider is globally registered, the
 * no-op one by default.
 */
export function createLocalTracingHandle(
  tracer: Tracer = trace.getTracer(TRACER_NAME)
): TracingHandle {
  return {tracer, enabled: false, shutdown: async () => {}};
}

export function langSmithTracesUrl(endpoint: string): string {
  return `${endpoint.replace(/\/+$/, '')}/otel/v1/traces`;
}

/**
 * Sets up span export to LangSmith over OTLP/HTTP.
 *
 * Without an API key, or when the SDK cannot be loaded, returns a handle
 * that does not export; the second case logs one warning.
 */
export async function initTracing(
  config: TracingConfig,
  loadSdk: TracingSdkLoader = importTracingSdk
): Promise<TracingHandle> {
  if (!config.apiKey) {
    logger.info('LANGSMITH_API_KEY is not set; traces will not be exported.');
    return createLocalTracingHandle();
  }

  let sdk: TracingSdk;
  try {
    sdk = await loadSdk();
  } catch (e: unknown) {
    const reason = e instanceof Error ? e.message : String(e);
    logger.warn(`OpenTelemetry SDK unavailable, tracing disabled: ${reason}`);
    return createLocalTracingHandle();
  }

  const exporter = new sdk.OTLPTraceExporter({
    url: langSmithTracesUrl(config.endpoint),
    headers: {
      'x-api-key': config.apiKey,
      'Langsmith-Project': config.projectName,
    },
  });
  const provider = new sdk.NodeTracerProvider({
    resource: sdk.resourceFromAttributes({'service.name': config.serviceName}),
    spanProcessors: [new sdk.BatchSpanProcessor(exporter)],
  });
  provider.register();

  logger.info(
    `Exporting traces to ${langSmithTracesUrl(config.endpoint)} (project "${config.projectName}")`
  );

  return {
    tracer: provider.getTracer(TRACER_NAME),
    enabled: true,
    shutdown: () => provider.shutdown(),
  };
}
