/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export * from './a2a_app.js';
export * from './a2a_server.js';
export * from './task_reference_middleware.js';
export * from './thread_tracing_middleware.js';
