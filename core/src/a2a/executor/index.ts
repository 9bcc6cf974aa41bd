/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export * from './a2a_agent_executor.js';
export * from './task_result_aggregator.js';
