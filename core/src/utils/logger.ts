/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {LogLevel, setLogLevel as setAgentLogLevel} from '@google/adk';

export {LogLevel};

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

/** Most to least verbose. */
const LEVEL_ORDER: readonly LogLevel[] = [
  LogLevel.DEBUG,
  LogLevel.INFO,
  LogLevel.WARN,
  LogLevel.ERROR,
];

const LEVEL_STYLES = new Map<LogLevel, {label: string; color: string}>([
  [LogLevel.DEBUG, {label: 'DEBUG', color: '\x1b[34m'}],
  [LogLevel.INFO, {label: 'INFO', color: '\x1b[32m'}],
  [LogLevel.WARN, {label: 'WARN', color: '\x1b[33m'}],
  [LogLevel.ERROR, {label: 'ERROR', color: '\x1b[31m'}],
]);

const RESET_COLOR = '\x1b[0m';

let currentLevel = LogLevel.INFO;

/**
 * Sets the process-wide log level, for this package and for the agent
 * framework's own logger.
 */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
  setAgentLogLevel(level);
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function isEnabled(level: LogLevel): boolean {
  return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(currentLevel);
}

function prefix(level: LogLevel): string {
  const style = LEVEL_STYLES.get(level);
  return style ? `${style.color}[A2A ${style.label}]:${RESET_COLOR}` : '[A2A]:';
}

class ConsoleLogger implements Logger {
  debug(...args: unknown[]): void {
    if (!isEnabled(LogLevel.DEBUG)) {
      return;
    }
    console.debug(prefix(LogLevel.DEBUG), ...args);
  }

  info(...args: unknown[]): void {
    if (!isEnabled(LogLevel.INFO)) {
      return;
    }
    console.info(prefix(LogLevel.INFO), ...args);
  }

  warn(...args: unknown[]): void {
    if (!isEnabled(LogLevel.WARN)) {
      return;
    }
    console.warn(prefix(LogLevel.WARN), ...args);
  }

  error(...args: unknown[]): void {
    console.error(prefix(LogLevel.ERROR), ...args);
  }
}

export const logger: Logger = new ConsoleLogger();
