/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export {
  CALCULATOR_AGENT_DESCRIPTION,
  CALCULATOR_AGENT_DESCRIPTOR,
  CALCULATOR_AGENT_NAME,
  CALCULATOR_INSTRUCTION,
  createCalculatorAgent,
  createInMemoryRunner,
} from './agents/calculator_agent.js';
export type {CalculatorAgentOptions} from './agents/calculator_agent.js';
export {
  CALCULATE_TOOL_NAME,
  calculate,
  calculateTool,
} from './tools/calculator/calculate_tool.js';
export {
  ALLOWED_FUNCTION_NAMES,
  ExpressionError,
  evaluateExpression,
  formatExpressionValue,
  roundHalfEven,
} from './tools/calculator/expression_evaluator.js';
export type {
  AllowedFunctionName,
  ExpressionValue,
  Scalar,
} from './tools/calculator/expression_evaluator.js';

export * from './a2a/index.js';

export {
  A2AEndpointClient,
  ERROR_BODY_PREVIEW_LENGTH,
  buildSendMessagePayload,
  parseSendMessageResponse,
} from './relay/a2a_endpoint_client.js';
export type {
  A2AEndpoint,
  MessageSender,
  SendMessageRequest,
  SendMessageResult,
} from './relay/a2a_endpoint_client.js';
export {
  ConversationRelay,
  DEFAULT_ROUND_DELAY_MS,
} from './relay/conversation_relay.js';
export type {
  EndpointThreadState,
  RelayFailure,
  RelayObserver,
  RelayOptions,
  RelayOutcome,
  RelaySide,
  RelaySnapshot,
  RelayState,
  RelayTurn,
} from './relay/conversation_relay.js';

export {
  TRACER_NAME,
  createLocalTracingHandle,
  importTracingSdk,
  initTracing,
  langSmithTracesUrl,
} from './telemetry/setup.js';
export type {
  TracingConfig,
  TracingHandle,
  TracingSdk,
  TracingSdkLoader,
} from './telemetry/setup.js';
export {
  THREAD_ID_SPAN_ATTRIBUTE,
  ensureContextPropagation,
  getActiveThreadId,
  setThreadId,
} from './telemetry/thread_context.js';

export {
  ConfigError,
  DEFAULT_INITIAL_MESSAGE,
  DEFAULT_LANGGRAPH_BASE_URL,
  langGraphA2aUrl,
  loadConfig,
} from './config/env_config.js';
export type {
  AgentConfig,
  AppConfig,
  RelayConfig,
  ServerConfig,
} from './config/env_config.js';

export {LogLevel, getLogLevel, logger, setLogLevel} from './utils/logger.js';
export type {Logger} from './utils/logger.js';
