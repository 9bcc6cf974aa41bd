/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {z} from 'zod';

import type {TracingConfig} from '../telemetry/setup.js';

export const DEFAULT_INITIAL_MESSAGE =
  "Repeat this exact message back to me: Hello! I'm a LangChain agent. " +
  'Can you help me calculate something?';

export const DEFAULT_LANGGRAPH_BASE_URL = 'http://127.0.0.1:2024';

const optionalString = z.string().min(1).optional();

const envSchema = z.object({
  AGENT_MODEL: z.string().min(1).default('gemini-2.5-flash'),
  GOOGLE_GENAI_API_KEY: optionalString,
  GEMINI_API_KEY: optionalString,
  A2A_HOST: z.string().min(1).default('localhost'),
  A2A_PORT: z.coerce.number().int().min(0).max(65535).default(8002),
  LANGSMITH_API_KEY: optionalString,
  LANGSMITH_PROJECT: z.string().min(1).default('a2a-distributed-tracing'),
  LANGSMITH_ENDPOINT: z.string().url().default('https://api.smith.langchain.com'),
  NUM_ROUNDS: z.coerce.number().int().min(1).default(5),
  INITIAL_MESSAGE: z.string().min(1).default(DEFAULT_INITIAL_MESSAGE),
  LANGCHAIN_ASSISTANT_ID: optionalString,
  RELAY_FIRST_URL: z.string().url().optional(),
  RELAY_SECOND_URL: z.string().url().default('http://localhost:8002/'),
  RELAY_ROUND_DELAY_MS: z.coerce.number().int().min(0).default(500),
});

export interface AgentConfig {
  model: string;
  /** Whether a Gemini API key is present in the environment. */
  apiKeyConfigured: boolean;
}

export interface ServerConfig {
  host: string;
  port: number;
}

export interface RelayConfig {
  rounds: number;
  initialMessage: string;
  assistantId?: string;
  firstUrl?: string;
  secondUrl: string;
  roundDelayMs: number;
}

export interface AppConfig {
  agent: AgentConfig;
  server: ServerConfig;
  tracing: TracingConfig;
  relay: RelayConfig;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * A2A URL of an assistant on a local LangGraph server.
 */
export function langGraphA2aUrl(
  assistantId: string,
  baseUrl: string = DEFAULT_LANGGRAPH_BASE_URL
): string {
  return `${baseUrl.replace(/\/+$/, '')}/a2a/${encodeURIComponent(assistantId)}`;
}

/**
 * Reads and validates the configuration. Empty variables count as unset.
 *
 * @throws ConfigError naming every invalid variable.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      present[key] = value.trim();
    }
  }

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join('.')}: ${issue.message}`
      )
    );
  }
  const vars = parsed.data;

  return {
    agent: {
      model: vars.AGENT_MODEL,
      apiKeyConfigured: Boolean(vars.GOOGLE_GENAI_API_KEY ?? vars.GEMINI_API_KEY),
    },
    server: {host: vars.A2A_HOST, port: vars.A2A_PORT},
    tracing: {
      serviceName: 'a2a-relay',
      projectName: vars.LANGSMITH_PROJECT,
      apiKey: vars.LANGSMITH_API_KEY,
      endpoint: vars.LANGSMITH_ENDPOINT,
    },
    relay: {
      rounds: vars.NUM_ROUNDS,
      initialMessage: vars.INITIAL_MESSAGE,
      assistantId: vars.LANGCHAIN_ASSISTANT_ID,
      firstUrl:
        vars.RELAY_FIRST_URL ??
        (vars.LANGCHAIN_ASSISTANT_ID
          ? langGraphA2aUrl(vars.LANGCHAIN_ASSISTANT_ID)
          : undefined),
      secondUrl: vars.RELAY_SECOND_URL,
      roundDelayMs: vars.RELAY_ROUND_DELAY_MS,
    },
  };
}
