/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export {
  A2A_USER_ID_PREFIX,
  RELAY_METADATA_KEY_PREFIX,
  getRelayMetadataKey,
  isRecord,
  toA2aUserId,
} from './utils.js';
export {
  A2A_DATA_PART_END_TAG,
  A2A_DATA_PART_METADATA_TYPE_FUNCTION_CALL,
  A2A_DATA_PART_METADATA_TYPE_FUNCTION_RESPONSE,
  A2A_DATA_PART_METADATA_TYPE_KEY,
  A2A_DATA_PART_START_TAG,
  convertA2aPartToGenaiPart,
  convertGenaiPartToA2aPart,
  extractText,
  type A2APartToGenAIPartConverter,
  type GenAIPartToA2APartConverter,
} from './part_converter.js';
export {
  convertA2aRequestToAgentRunRequest,
  type A2ARequestContext,
  type A2ARequestToAgentRunRequestConverter,
  type AgentRunRequest,
} from './request_converter.js';
export {
  convertEventToA2aEvents,
  convertEventToA2aMessage,
  type A2AEvent,
  type AdkEventToA2AEventsConverter,
} from './event_converter.js';
