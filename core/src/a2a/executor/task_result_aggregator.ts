/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type {A2AEvent} from '../converters/event_converter.js';
import type {A2AMessage, A2APart, A2ATaskState} from '../types.js';
import {getRelayMetadataKey} from '../converters/utils.js';

/**
 * Higher priority states override lower priority ones.
 */
const STATE_PRIORITY: Record<A2ATaskState, number> = {
  failed: 4,
  'auth-required': 3,
  'input-required': 2,
  working: 1,
  submitted: 0,
  completed: 0,
  canceled: 0,
  rejected: 0,
  unknown: 0,
};

const TYPE_KEY = getRelayMetadataKey('type');

function isToolTraffic(part: A2APart): boolean {
  return part.kind === 'data' && part.metadata?.[TYPE_KEY] !== undefined;
}

/**
 * Folds the status updates of one agent run into its final state and the
 * message that becomes the task's artifact.
 */
export class TaskResultAggregator {
  private _taskState: A2ATaskState = 'working';
  private _taskStatusMessage: A2AMessage | undefined;

  processEvent(event: A2AEvent): void {
    if (event.kind !== 'status-update') {
      return;
    }
    const newState = event.status.state;
    if (STATE_PRIORITY[newState] < STATE_PRIORITY[this._taskState]) {
      return;
    }
    this._taskState = newState;
    const message = event.status.message;
    // Tool calls and their responses are not the agent's answer.
    if (message && !message.parts.every(isToolTraffic)) {
      this._taskStatusMessage = message;
    }
  }

  get taskState(): A2ATaskState {
    return this._taskState;
  }

  get taskStatusMessage(): A2AMessage | undefined {
    return this._taskStatusMessage;
  }
}
