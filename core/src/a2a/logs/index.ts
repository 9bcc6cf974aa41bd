/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export {
  buildA2aRequestLog,
  buildA2aResponseLog,
  buildMessagePartLog,
  type A2ATaskForLog,
} from './log_utils.js';
