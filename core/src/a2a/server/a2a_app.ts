/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {AGENT_CARD_PATH, type AgentCard} from '@a2a-js/sdk';
import {
  type AgentExecutor,
  DefaultRequestHandler,
  InMemoryTaskStore,
  type TaskStore,
} from '@a2a-js/sdk/server';
import {
  UserBuilder,
  agentCardHandler,
  jsonRpcHandler,
} from '@a2a-js/sdk/server/express';
import cors from 'cors';
import express from 'express';

import {createLocalTracingHandle, type TracingHandle} from '../../telemetry/setup.js';
import {createTaskReferenceMiddleware} from './task_reference_middleware.js';
import {
  createThreadTracingErrorHandler,
  createThreadTracingMiddleware,
} from './thread_tracing_middleware.js';

export const AGENT_CARD_PATHS = [
  `/${AGENT_CARD_PATH}`,
  '/.well-known/agent.json',
];

export interface A2aAppOptions {
  executor: AgentExecutor;
  agentCard: AgentCard;
  /** Defaults to a handle that exports nothing. */
  tracing?: TracingHandle;
  /** Path of the JSON-RPC endpoint (default: "/"). */
  rpcPath?: string;
  /** Comma separated CORS origins. */
  allowOrigins?: string;
  taskStore?: TaskStore;
  /** Request body limit (default: "50mb"). */
  bodyLimit?: string;
}

/**
 * Builds the express application that serves an agent over A2A JSON-RPC.
 */
export function toA2aApp(options: A2aAppOptions): express.Express {
  const {
    executor,
    agentCard,
    tracing = createLocalTracingHandle(),
    rpcPath = '/',
    allowOrigins,
    taskStore = new InMemoryTaskStore(),
    bodyLimit = '50mb',
  } = options;

  const requestHandler = new DefaultRequestHandler(agentCard, taskStore, executor);
  const app = express();

  if (allowOrigins) {
    app.use(
      cors({
        origin: allowOrigins.split(',').map((origin) => origin.trim()),
      })
    );
  }

  for (const cardPath of AGENT_CARD_PATHS) {
    app.use(cardPath, agentCardHandler({agentCardProvider: requestHandler}));
  }

  const rpc = express.Router();
  rpc.post(
    '/',
    // Buffer the body once; the tracing middleware reads the raw text before
    // it is decoded for the JSON-RPC handler.
    express.raw({type: () => true, limit: bodyLimit}),
    createThreadTracingMiddleware({tracing, agentName: agentCard.name}),
    createTaskReferenceMiddleware(taskStore),
    jsonRpcHandler({requestHandler, userBuilder: UserBuilder.noAuthentication})
  );
  app.use(rpcPath, rpc);
  app.use(createThreadTracingErrorHandler());

  return app;
}
