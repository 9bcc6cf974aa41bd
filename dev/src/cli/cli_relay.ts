/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  type A2AEndpoint,
  A2AEndpointClient,
  ConfigError,
  ConversationRelay,
  type MessageSender,
  type RelayConfig,
  type RelayOutcome,
  langGraphA2aUrl,
  logger,
} from '@a2a-relay/core';
import {z} from 'zod';

import {ConsoleRelayReporter} from './relay_reporter.js';

export const RELAY_USAGE = [
  'Error: no first endpoint URL.',
  '',
  'Usage:',
  '  a2a-relay relay <assistant_id> [num_rounds] [initial_message]',
  '  a2a-relay relay --first_url <url> [--second_url <url>]',
  '',
  'Or set environment variables:',
  '  export LANGCHAIN_ASSISTANT_ID=<assistant_id>',
  '  export RELAY_FIRST_URL=<url>',
  '',
  'To get the assistant_id:',
  '  1. Start the LangGraph agent: langgraph dev --port 2024',
  '  2. Copy the assistant_id from its output',
].join('\n');

/** Positional arguments of the relay command, as typed. */
export interface RelayArguments {
  assistantId?: string;
  numRounds?: string;
  initialMessage?: string;
}

/** Flags of the relay command, named as commander names them. */
export interface RelayCommandOptions {
  first_url?: string;
  second_url?: string;
  delay_ms?: string;
  no_task_ids?: boolean;
}

export interface RelaySettings {
  first: A2AEndpoint;
  second: A2AEndpoint;
  rounds: number;
  initialMessage: string;
  roundDelayMs: number;
  referenceTasks: boolean;
}

const roundsSchema = z.coerce.number().int().min(1);
const delaySchema = z.coerce.number().int().min(0);
const urlSchema = z.string().url();

function parseWith<T>(schema: z.ZodType<T>, key: string, value: string): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${key}: ${issue.message}`)
    );
  }
  return parsed.data;
}

/**
 * Combines positional arguments, flags and environment configuration, in
 * that order of precedence.
 *
 * An assistant id (positional, else from the environment when no explicit
 * first URL is configured) points the first endpoint at the local LangGraph
 * server, which reads the message id from `params.messageId`.
 *
 * @returns undefined when no first endpoint URL can be determined.
 * @throws ConfigError for a malformed round count, delay or URL.
 */
export function resolveRelaySettings(
  args: RelayArguments,
  options: RelayCommandOptions,
  config: RelayConfig
): RelaySettings | undefined {
  let firstUrl: string | undefined;
  let assistantId: string | undefined;
  if (args.assistantId) {
    assistantId = args.assistantId;
    firstUrl = langGraphA2aUrl(assistantId);
  } else if (options.first_url) {
    firstUrl = parseWith(urlSchema, '--first_url', options.first_url);
  } else {
    firstUrl = config.firstUrl;
    assistantId =
      config.assistantId && firstUrl === langGraphA2aUrl(config.assistantId)
        ? config.assistantId
        : undefined;
  }
  if (!firstUrl) {
    return undefined;
  }

  const secondUrl = options.second_url
    ? parseWith(urlSchema, '--second_url', options.second_url)
    : config.secondUrl;

  return {
    first: {
      name: assistantId ? `LangChain Agent (${assistantId})` : 'Agent A',
      url: firstUrl,
      echoMessageIdInParams: assistantId !== undefined,
    },
    second: {name: 'Agent B', url: secondUrl},
    rounds:
      args.numRounds !== undefined
        ? parseWith(roundsSchema, 'num_rounds', args.numRounds)
        : config.rounds,
    initialMessage: args.initialMessage || config.initialMessage,
    roundDelayMs:
      options.delay_ms !== undefined
        ? parseWith(delaySchema, '--delay_ms', options.delay_ms)
        : config.roundDelayMs,
    referenceTasks: !options.no_task_ids,
  };
}

export interface RunRelayDeps {
  createSender?: (endpoint: A2AEndpoint) => MessageSender;
  reporter?: ConsoleRelayReporter;
  sleep?: (ms: number) => Promise<unknown>;
}

/**
 * Runs the relay and prints its progress.
 */
export async function runRelay(
  settings: RelaySettings,
  deps: RunRelayDeps = {}
): Promise<RelayOutcome> {
  const createSender =
    deps.createSender ?? ((endpoint: A2AEndpoint) => new A2AEndpointClient(endpoint));
  const reporter = deps.reporter ?? new ConsoleRelayReporter();

  reporter.start(
    {
      A: `${settings.first.name} ${settings.first.url}`,
      B: `${settings.second.name} ${settings.second.url}`,
    },
    settings.rounds
  );

  const relay = new ConversationRelay(
    createSender(settings.first),
    createSender(settings.second)
  );
  const outcome = await relay.run({
    rounds: settings.rounds,
    initialMessage: settings.initialMessage,
    roundDelayMs: settings.roundDelayMs,
    referenceTasks: settings.referenceTasks,
    observer: reporter,
    sleep: deps.sleep,
  });

  reporter.finish(outcome);
  logger.debug(
    `Relay ${outcome.state} after ${outcome.roundsCompleted} round(s), thread ${outcome.threadId}`
  );
  return outcome;
}

/** 0 when the relay ran every round, 1 otherwise. */
export function relayExitCode(outcome: RelayOutcome): number {
  return outcome.state === 'DONE' ? 0 : 1;
}
