/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * A2A (Agent-to-Agent) protocol support: wire types, conversion between A2A
 * and agent runner data, and the JSON-RPC endpoint that serves an agent.
 */

export * from './types.js';
export * from './errors.js';
export * from './converters/index.js';
export * from './executor/index.js';
export * from './logs/index.js';
export * from './server/index.js';
export * from './utils/index.js';
export {formatZodIssues} from './schemas.js';
