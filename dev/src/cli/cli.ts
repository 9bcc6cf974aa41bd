#!/usr/bin/env tsx
/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import dotenv from 'dotenv';
import {Argument, Command, Option} from 'commander';
import {ConfigError, loadConfig, logger, setLogLevel} from '@a2a-relay/core';

import {
  type RelayCommandOptions,
  type RelaySettings,
  RELAY_USAGE,
  relayExitCode,
  resolveRelaySettings,
  runRelay,
} from './cli_relay.js';
import {closeOnSignals, serveCalculatorAgent} from './cli_serve.js';
import {getLogLevelFromOptions, type LogOptions} from './log_options.js';

dotenv.config();

const HOST_OPTION = new Option(
    '--host <string>',
    'Optional. The binding host of the server (default: A2A_HOST or localhost)');
const PORT_OPTION = new Option(
    '-p, --port <number>',
    'Optional. The port of the server (default: A2A_PORT or 8002)');
const MODEL_OPTION = new Option(
    '--model <string>',
    'Optional. Model used by the calculator agent (default: AGENT_MODEL or gemini-2.5-flash)');
const ORIGINS_OPTION = new Option(
    '--allow_origins <string>',
    'Optional. Comma-separated origins allowed by CORS');
const VERBOSE_OPTION =
    new Option('-v, --verbose [boolean]', 'Optional. Log at debug level')
        .default(false);
const LOG_LEVEL_OPTION =
    new Option('--log_level <string>', 'Optional. The log level')
        .default('info');

const FIRST_URL_OPTION = new Option(
    '--first_url <url>',
    'Optional. JSON-RPC URL of the first endpoint (default: RELAY_FIRST_URL)');
const SECOND_URL_OPTION = new Option(
    '--second_url <url>',
    'Optional. JSON-RPC URL of the second endpoint (default: RELAY_SECOND_URL or http://localhost:8002/)');
const DELAY_OPTION = new Option(
    '--delay_ms <number>',
    'Optional. Pause after each round in milliseconds (default: RELAY_ROUND_DELAY_MS or 500)');
const NO_TASK_IDS_OPTION = new Option(
    '--no_task_ids',
    'Optional. Do not send the previous task id with each message');

interface ServeCommandOptions extends LogOptions {
  host?: string;
  port?: string;
  model?: string;
  allow_origins?: string;
}

function loadConfigOrExit() {
  try {
    return loadConfig();
  } catch (e: unknown) {
    if (e instanceof ConfigError) {
      logger.error(e.message);
      process.exit(1);
    }
    throw e;
  }
}

const program = new Command('a2a-relay');

program.command('serve')
    .description('Serve the calculator agent as an A2A endpoint')
    .addOption(HOST_OPTION)
    .addOption(PORT_OPTION)
    .addOption(MODEL_OPTION)
    .addOption(ORIGINS_OPTION)
    .addOption(VERBOSE_OPTION)
    .addOption(LOG_LEVEL_OPTION)
    .action(async (options: ServeCommandOptions) => {
      setLogLevel(getLogLevelFromOptions(options));
      const config = loadConfigOrExit();
      const port = options.port !== undefined ? parseInt(options.port, 10) : undefined;
      if (port !== undefined && (Number.isNaN(port) || port < 0 || port > 65535)) {
        logger.error(`Invalid port: ${options.port}`);
        process.exit(1);
      }

      const endpoint = await serveCalculatorAgent(config, {
        host: options.host,
        port,
        model: options.model,
        allowOrigins: options.allow_origins,
      });
      closeOnSignals(endpoint);
    });

program.command('relay')
    .description('Relay a conversation between two A2A endpoints')
    .addArgument(new Argument(
        '[assistant_id]',
        'LangGraph assistant id; the first endpoint becomes http://127.0.0.1:2024/a2a/<assistant_id>'))
    .addArgument(new Argument('[num_rounds]', 'Number of rounds (default: NUM_ROUNDS or 5)'))
    .addArgument(new Argument('[initial_message]', 'First message sent to the first endpoint'))
    .addOption(FIRST_URL_OPTION)
    .addOption(SECOND_URL_OPTION)
    .addOption(DELAY_OPTION)
    .addOption(NO_TASK_IDS_OPTION)
    .addOption(VERBOSE_OPTION)
    .addOption(LOG_LEVEL_OPTION)
    .action(async (
        assistantId: string | undefined,
        numRounds: string | undefined,
        initialMessage: string | undefined,
        options: RelayCommandOptions & LogOptions) => {
      setLogLevel(getLogLevelFromOptions(options));
      const config = loadConfigOrExit();

      let settings: RelaySettings | undefined;
      try {
        settings = resolveRelaySettings(
            {assistantId, numRounds, initialMessage}, options, config.relay);
      } catch (e: unknown) {
        if (e instanceof ConfigError) {
          logger.error(e.message);
          process.exit(1);
        }
        throw e;
      }
      if (!settings) {
        console.log(RELAY_USAGE);
        process.exit(1);
      }

      const outcome = await runRelay(settings);
      process.exit(relayExitCode(outcome));
    });

program.parseAsync(process.argv).catch((e: unknown) => {
  logger.error(e);
  process.exit(1);
});
