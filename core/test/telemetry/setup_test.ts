/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {isSpanContextValid, trace} from '@opentelemetry/api';
import {afterEach, describe, expect, it, vi} from 'vitest';

import {
  createLocalTracingHandle,
  importTracingSdk,
  initTracing,
  langSmithTracesUrl,
  type TracingConfig,
} from '../../src/telemetry/setup.js';
import {logger} from '../../src/utils/logger.js';

const config: TracingConfig = {
  serviceName: 'a2a-relay-test',
  projectName: 'relay-project',
  apiKey: 'test-secret',
  endpoint: 'https://smith.example.com/',
};

describe('langSmithTracesUrl', () => {
  it('appends the OTLP traces path', () => {
    expect(langSmithTracesUrl('https://api.smith.langchain.com')).toBe(
      'https://api.smith.langchain.com/otel/v1/traces'
    );
    expect(langSmithTracesUrl('https://smith.example.com//')).toBe(
      'https://smith.example.com/otel/v1/traces'
    );
  });
});

describe('createLocalTracingHandle', () => {
  it('is disabled and shuts down without work', async () => {
    const handle = createLocalTracingHandle();

    expect(handle.enabled).toBe(false);
    await expect(handle.shutdown()).resolves.toBeUndefined();
  });
});

describe('initTracing', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    trace.disable();
  });

  it('stays local without an API key', async () => {
    const info = vi.spyOn(logger, 'info').mockImplementation(() => {});
    const loadSdk = vi.fn(importTracingSdk);

    const handle = await initTracing({...config, apiKey: undefined}, loadSdk);

    expect(handle.enabled).toBe(false);
    expect(loadSdk).not.toHaveBeenCalled();
    expect(info).toHaveBeenCalledWith(
      'LANGSMITH_API_KEY is not set; traces will not be exported.'
    );
  });

  it('warns once and stays local when the SDK cannot be loaded', async () => {
    const warn = vi.spyOn(logger, 'warn').mockImplementation(() => {});

    const handle = await initTracing(config, async () => {
      throw new Error('Cannot find package');
    });

    expect(handle.enabled).toBe(false);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      'OpenTelemetry SDK unavailable, tracing disabled: Cannot find package'
    );
  });

  it('exports to LangSmith over OTLP when configured', async () => {
    vi.spyOn(logger, 'info').mockImplementation(() => {});
    const sdk = await importTracingSdk();
    type ExporterConfig = ConstructorParameters<typeof sdk.OTLPTraceExporter>[0];
    const exporterConfigs: ExporterConfig[] = [];
    class RecordingExporter extends sdk.OTLPTraceExporter {
      constructor(exporterConfig?: ExporterConfig) {
        super(exporterConfig);
        exporterConfigs.push(exporterConfig);
      }
    }

    const handle = await initTracing(config, async () => ({
      ...sdk,
      OTLPTraceExporter: RecordingExporter,
    }));

    expect(handle.enabled).toBe(true);
    expect(exporterConfigs).toEqual([
      {
        url: 'https://smith.example.com/otel/v1/traces',
        headers: {
          'x-api-key': 'test-secret',
          'Langsmith-Project': 'relay-project',
        },
      },
    ]);
    // Left open so that shutdown has nothing to send.
    const span = handle.tracer.startSpan('open-span');
    expect(span.isRecording()).toBe(true);
    expect(isSpanContextValid(span.spanContext())).toBe(true);

    await handle.shutdown();
  });
});
