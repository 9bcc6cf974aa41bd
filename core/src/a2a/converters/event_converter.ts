/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Conversion from agent runner events to A2A task events.
 */

import {randomUUID} from 'node:crypto';
import type {Event} from '@google/adk';

import type {
  A2AMessage,
  A2APart,
  A2ATaskArtifactUpdateEvent,
  A2ATaskStatusUpdateEvent,
} from '../types.js';
import {
  type GenAIPartToA2APartConverter,
  convertGenaiPartToA2aPart,
} from './part_converter.js';
import {getRelayMetadataKey} from './utils.js';

const DEFAULT_ERROR_MESSAGE = 'An error occurred during processing';

export type A2AEvent = A2ATaskStatusUpdateEvent | A2ATaskArtifactUpdateEvent;

export type AdkEventToA2AEventsConverter = (
  event: Event,
  taskId: string,
  contextId: string,
  partConverter?: GenAIPartToA2APartConverter
) => A2AEvent[];

function eventMetadata(event: Event): Record<string, unknown> {
  const metadata: Record<string, unknown> = {
    [getRelayMetadataKey('author')]: event.author,
    [getRelayMetadataKey('invocation_id')]: event.invocationId,
  };
  if (event.errorCode) {
    metadata[getRelayMetadataKey('error_code')] = String(event.errorCode);
  }
  return metadata;
}

/**
 * Converts the content of a runner event to an agent message.
 *
 * @returns undefined when no part of the event has an A2A counterpart.
 */
export function convertEventToA2aMessage(
  event: Event,
  taskId: string,
  contextId: string,
  partConverter: GenAIPartToA2APartConverter = convertGenaiPartToA2aPart
): A2AMessage | undefined {
  const parts: A2APart[] = [];
  for (const part of event.content?.parts ?? []) {
    const a2aPart = partConverter(part);
    if (a2aPart) {
      parts.push(a2aPart);
    }
  }
  if (parts.length === 0) {
    return undefined;
  }
  return {
    kind: 'message',
    messageId: randomUUID(),
    role: 'agent',
    parts,
    taskId,
    contextId,
  };
}

/**
 * Converts one runner event into the A2A events it implies.
 *
 * An event carrying an error yields a failed status; content yields a
 * working status whose message holds the converted parts. Streaming partials
 * are skipped since only complete turns are reported.
 */
export function convertEventToA2aEvents(
  event: Event,
  taskId: string,
  contextId: string,
  partConverter: GenAIPartToA2APartConverter = convertGenaiPartToA2aPart
): A2AEvent[] {
  if (event.partial) {
    return [];
  }

  const a2aEvents: A2AEvent[] = [];

  if (event.errorCode || event.errorMessage) {
    a2aEvents.push({
      kind: 'status-update',
      taskId,
      contextId,
      metadata: eventMetadata(event),
      status: {
        state: 'failed',
        timestamp: new Date().toISOString(),
        message: {
          kind: 'message',
          messageId: randomUUID(),
          role: 'agent',
          parts: [
            {kind: 'text', text: event.errorMessage ?? DEFAULT_ERROR_MESSAGE},
          ],
          taskId,
          contextId,
        },
      },
      final: false,
    });
  }

  const message = convertEventToA2aMessage(
    event,
    taskId,
    contextId,
    partConverter
  );
  if (message) {
    a2aEvents.push({
      kind: 'status-update',
      taskId,
      contextId,
      metadata: eventMetadata(event),
      status: {
        state: 'working',
        message,
        timestamp: new Date().toISOString(),
      },
      final: false,
    });
  }

  return a2aEvents;
}
