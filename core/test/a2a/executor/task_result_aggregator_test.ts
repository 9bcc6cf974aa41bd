/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {describe, expect, it} from 'vitest';

import {TaskResultAggregator} from '../../../src/a2a/executor/task_result_aggregator.js';
import type {
  A2AMessage,
  A2APart,
  A2ATaskState,
  A2ATaskStatusUpdateEvent,
} from '../../../src/a2a/types.js';

function message(id: string, parts: A2APart[]): A2AMessage {
  return {kind: 'message', messageId: id, role: 'agent', parts};
}

function statusUpdate(
  state: A2ATaskState,
  msg?: A2AMessage
): A2ATaskStatusUpdateEvent {
  return {
    kind: 'status-update',
    taskId: 'task-1',
    contextId: 'ctx-1',
    status: {state, message: msg},
    final: false,
  };
}

describe('TaskResultAggregator', () => {
  it('starts in the working state without a message', () => {
    const aggregator = new TaskResultAggregator();

    expect(aggregator.taskState).toBe('working');
    expect(aggregator.taskStatusMessage).toBeUndefined();
  });

  it('keeps the latest working message', () => {
    const aggregator = new TaskResultAggregator();
    const first = message('m1', [{kind: 'text', text: 'one'}]);
    const second = message('m2', [{kind: 'text', text: 'two'}]);

    aggregator.processEvent(statusUpdate('working', first));
    aggregator.processEvent(statusUpdate('working', second));

    expect(aggregator.taskStatusMessage).toBe(second);
  });

  it('lets failed override working and ignores later working updates', () => {
    const aggregator = new TaskResultAggregator();
    const failure = message('m1', [{kind: 'text', text: 'boom'}]);

    aggregator.processEvent(statusUpdate('failed', failure));
    aggregator.processEvent(
      statusUpdate('working', message('m2', [{kind: 'text', text: 'late'}]))
    );

    expect(aggregator.taskState).toBe('failed');
    expect(aggregator.taskStatusMessage).toBe(failure);
  });

  it('ranks auth-required above input-required', () => {
    const aggregator = new TaskResultAggregator();

    aggregator.processEvent(statusUpdate('auth-required'));
    aggregator.processEvent(statusUpdate('input-required'));

    expect(aggregator.taskState).toBe('auth-required');
  });

  it('does not take tool traffic as the answer', () => {
    const aggregator = new TaskResultAggregator();
    const answer = message('m1', [{kind: 'text', text: 'The result is: 4'}]);

    aggregator.processEvent(statusUpdate('working', answer));
    aggregator.processEvent(
      statusUpdate(
        'working',
        message('m2', [
          {
            kind: 'data',
            data: {name: 'calculate', args: {expression: '2 + 2'}},
            metadata: {a2a_relay_type: 'function_call'},
          },
        ])
      )
    );

    expect(aggregator.taskStatusMessage).toBe(answer);
  });

  it('ignores artifact updates', () => {
    const aggregator = new TaskResultAggregator();

    aggregator.processEvent({
      kind: 'artifact-update',
      taskId: 'task-1',
      contextId: 'ctx-1',
      artifact: {artifactId: 'a1', parts: [{kind: 'text', text: 'x'}]},
      lastChunk: true,
    });

    expect(aggregator.taskState).toBe('working');
    expect(aggregator.taskStatusMessage).toBeUndefined();
  });
});
