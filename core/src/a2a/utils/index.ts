/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export {
  A2A_PROTOCOL_VERSION,
  AgentCardBuilder,
  extractExamplesFromInstruction,
  replacePronouns,
  type AgentCapabilities,
  type AgentCard,
  type AgentCardBuilderOptions,
  type AgentDescriptor,
  type AgentProvider,
  type AgentSkill,
  type ToolDescriptor,
} from './agent_card_builder.js';
export {
  toA2a,
  type A2aServerComponents,
  type ToA2aOptions,
} from './agent_to_a2a.js';
