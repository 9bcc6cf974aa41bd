/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  type A2aServerComponents,
  type AppConfig,
  CALCULATOR_AGENT_DESCRIPTOR,
  type TracingHandle,
  createCalculatorAgent,
  createInMemoryRunner,
  initTracing,
  logger,
  toA2a,
} from '@a2a-relay/core';

export interface ServeOptions {
  host?: string;
  port?: number;
  model?: string;
  allowOrigins?: string;
}

export interface RunningEndpoint {
  components: A2aServerComponents;
  tracing: TracingHandle;
  /** Stops the server, then flushes pending spans. */
  close(): Promise<void>;
}

/**
 * Starts the calculator agent's A2A endpoint. Options take precedence over
 * the configuration.
 */
export async function serveCalculatorAgent(
  config: AppConfig,
  options: ServeOptions = {},
  initTracingFn: typeof initTracing = initTracing
): Promise<RunningEndpoint> {
  const host = options.host ?? config.server.host;
  const port = options.port ?? config.server.port;
  const model = options.model ?? config.agent.model;

  if (!config.agent.apiKeyConfigured) {
    logger.warn(
      'Neither GOOGLE_GENAI_API_KEY nor GEMINI_API_KEY is set; model calls will fail.'
    );
  }

  const tracing = await initTracingFn(config.tracing);
  const agent = createCalculatorAgent({model});
  const components = toA2a({
    agent: CALCULATOR_AGENT_DESCRIPTOR,
    runner: createInMemoryRunner(agent),
    tracing,
    host,
    port,
    allowOrigins: options.allowOrigins,
  });
  await components.server.start();

  let closed = false;
  return {
    components,
    tracing,
    close: async () => {
      if (closed) {
        return;
      }
      closed = true;
      await components.server.stop();
      await tracing.shutdown();
    },
  };
}

/**
 * Closes the endpoint on SIGINT or SIGTERM, then exits.
 */
export function closeOnSignals(endpoint: RunningEndpoint): void {
  const shutdown = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, shutting down`);
    endpoint.close().then(
      () => process.exit(0),
      (e: unknown) => {
        logger.error('Shutdown failed:', e);
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}
