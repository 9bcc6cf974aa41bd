/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type {RequestContext} from '@a2a-js/sdk/server';
import type {Content, Part as GenAIPart} from '@google/genai';

import type {A2APartToGenAIPartConverter} from './part_converter.js';
import {convertA2aPartToGenaiPart} from './part_converter.js';
import {toA2aUserId} from './utils.js';

/**
 * The ids the server assigned to one inbound `message/send` call, and the
 * user message it carried.
 */
export type A2ARequestContext = Pick<
  RequestContext,
  'taskId' | 'contextId' | 'userMessage'
>;

/**
 * Arguments for one agent runner invocation.
 */
export interface AgentRunRequest {
  userId: string;
  sessionId: string;
  newMessage: Content;
}

export type A2ARequestToAgentRunRequestConverter = (
  request: A2ARequestContext,
  partConverter?: A2APartToGenAIPartConverter
) => AgentRunRequest;

/**
 * Converts an A2A request to runner arguments.
 *
 * The A2A context id is the session id, so every turn of one conversation
 * lands in the same agent session.
 */
export function convertA2aRequestToAgentRunRequest(
  request: A2ARequestContext,
  partConverter: A2APartToGenAIPartConverter = convertA2aPartToGenaiPart
): AgentRunRequest {
  const parts: GenAIPart[] = [];
  for (const a2aPart of request.userMessage.parts) {
    const part = partConverter(a2aPart);
    if (part) {
      parts.push(part);
    }
  }

  return {
    userId: toA2aUserId(request.contextId),
    sessionId: request.contextId,
    newMessage: {role: 'user', parts},
  };
}
