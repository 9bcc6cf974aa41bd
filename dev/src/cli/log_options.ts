/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {LogLevel} from '@a2a-relay/core';

const LOG_LEVEL_MAP: Record<string, LogLevel> = {
  'debug': LogLevel.DEBUG,
  'info': LogLevel.INFO,
  'warn': LogLevel.WARN,
  'error': LogLevel.ERROR,
};

export interface LogOptions {
  verbose?: boolean|string;
  log_level?: string;
}

/**
 * `--verbose` wins over `--log_level`; unknown levels fall back to info.
 */
export function getLogLevelFromOptions(options: LogOptions): LogLevel {
  if (options.verbose === true || options.verbose === 'true') {
    return LogLevel.DEBUG;
  }

  if (typeof options.log_level === 'string') {
    return LOG_LEVEL_MAP[options.log_level.toLowerCase()] ?? LogLevel.INFO;
  }

  return LogLevel.INFO;
}
