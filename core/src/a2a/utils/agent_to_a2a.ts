/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Exposes an agent runner as an A2A endpoint.
 */

import type {TaskStore} from '@a2a-js/sdk/server';
import type express from 'express';

import type {TracingHandle} from '../../telemetry/setup.js';
import {logger} from '../../utils/logger.js';
import {
  A2aAgentExecutor,
  type AgentRunner,
  type RunnerFactory,
} from '../executor/a2a_agent_executor.js';
import {toA2aApp} from '../server/a2a_app.js';
import {A2aServer} from '../server/a2a_server.js';
import {
  AgentCardBuilder,
  type AgentCapabilities,
  type AgentCard,
  type AgentDescriptor,
  type AgentProvider,
} from './agent_card_builder.js';

export interface ToA2aOptions {
  /** What the agent card advertises. */
  agent: AgentDescriptor;
  runner: AgentRunner | RunnerFactory;
  tracing?: TracingHandle;
  /** Host for binding and the card URL (default: "localhost"). */
  host?: string;
  /** Port for binding and the card URL (default: 8002). */
  port?: number;
  /** Scheme of the card URL (default: "http"). */
  protocol?: string;
  /** Replaces the generated card. */
  agentCard?: AgentCard;
  capabilities?: AgentCapabilities;
  provider?: AgentProvider;
  docUrl?: string;
  agentVersion?: string;
  allowOrigins?: string;
  taskStore?: TaskStore;
}

export interface A2aServerComponents {
  executor: A2aAgentExecutor;
  agentCard: AgentCard;
  rpcUrl: string;
  app: express.Express;
  server: A2aServer;
}

/**
 * Builds everything needed to serve an agent over A2A.
 *
 * @example
 * ```typescript
 * const agent = createCalculatorAgent({model: 'gemini-2.5-flash'});
 * const {server} = toA2a({
 *   agent: CALCULATOR_AGENT_DESCRIPTOR,
 *   runner: createInMemoryRunner(agent),
 *   port: 8002,
 * });
 * await server.start();
 * ```
 */
export function toA2a(options: ToA2aOptions): A2aServerComponents {
  const {
    agent,
    runner,
    tracing,
    host = 'localhost',
    port = 8002,
    protocol = 'http',
    agentCard: providedAgentCard,
    capabilities,
    provider,
    docUrl,
    agentVersion,
    allowOrigins,
    taskStore,
  } = options;

  logger.info(`Setting up A2A endpoint for agent: ${agent.name}`);

  const rpcUrl = `${protocol}://${host}:${port}/`;
  const agentCard =
    providedAgentCard ??
    new AgentCardBuilder({
      agent,
      rpcUrl,
      capabilities,
      provider,
      docUrl,
      agentVersion,
    }).build();

  const executor = new A2aAgentExecutor(runner);
  const app = toA2aApp({
    executor,
    agentCard,
    tracing,
    allowOrigins,
    taskStore,
  });

  return {
    executor,
    agentCard,
    rpcUrl,
    app,
    server: new A2aServer(app, host, port),
  };
}
