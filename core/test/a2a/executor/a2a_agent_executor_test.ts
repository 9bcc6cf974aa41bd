/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  A2AError,
  DefaultExecutionEventBus,
  type ExecutionEventBus,
  RequestContext,
} from '@a2a-js/sdk/server';
import {createEvent} from '@google/adk';
import {afterEach, describe, expect, it, vi} from 'vitest';

import {A2aAgentExecutor} from '../../../src/a2a/executor/a2a_agent_executor.js';
import type {A2ATask} from '../../../src/a2a/types.js';
import {logger} from '../../../src/utils/logger.js';
import {FakeRunner, textEvent, userText} from '../fake_runner.js';

type PublishedEvent = Parameters<ExecutionEventBus['publish']>[0];

class RecordingBus extends DefaultExecutionEventBus {
  readonly events: PublishedEvent[] = [];
  finishedCount = 0;

  constructor() {
    super();
    this.on('event', (event) => this.events.push(event));
    this.on('finished', () => this.finishedCount++);
  }

  states(): string[] {
    return this.events.map((event) =>
      event.kind === 'status-update' ? event.status.state : event.kind
    );
  }
}

function requestContext(text: string, task?: A2ATask): RequestContext {
  return new RequestContext(
    {
      kind: 'message',
      messageId: 'm1',
      role: 'user',
      parts: [{kind: 'text', text}],
      contextId: 'ctx-1',
      taskId: 'task-1',
    },
    'task-1',
    'ctx-1',
    task
  );
}

describe('A2aAgentExecutor', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('publishes the task lifecycle for a successful run', async () => {
    const runner = new FakeRunner((call) => [
      textEvent(`You said: ${userText(call)}`),
    ]);
    const bus = new RecordingBus();

    await new A2aAgentExecutor(runner).execute(requestContext('hi'), bus);

    expect(bus.states()).toEqual([
      'task',
      'working',
      'working',
      'artifact-update',
      'completed',
    ]);
    expect(bus.events[0]).toMatchObject({
      kind: 'task',
      id: 'task-1',
      contextId: 'ctx-1',
      status: {state: 'submitted'},
      history: [{messageId: 'm1'}],
    });
    const artifact = bus.events[3];
    expect(artifact).toMatchObject({
      kind: 'artifact-update',
      taskId: 'task-1',
      contextId: 'ctx-1',
      lastChunk: true,
      artifact: {parts: [{kind: 'text', text: 'You said: hi'}]},
    });
    expect(bus.events[4]).toMatchObject({final: true});
    expect(bus.finishedCount).toBe(1);
  });

  it('does not publish the task again when it already exists', async () => {
    const bus = new RecordingBus();
    const existing: A2ATask = {
      kind: 'task',
      id: 'task-1',
      contextId: 'ctx-1',
      status: {state: 'input-required'},
    };

    await new A2aAgentExecutor(new FakeRunner(() => [textEvent('ok')])).execute(
      requestContext('hi', existing),
      bus
    );

    expect(bus.states()).toEqual([
      'working',
      'working',
      'artifact-update',
      'completed',
    ]);
  });

  it('refuses to cancel a task', async () => {
    const executor = new A2aAgentExecutor(new FakeRunner(() => []));

    await expect(executor.cancelTask('task-1', new RecordingBus())).rejects.toBeInstanceOf(
      A2AError
    );
  });

  it('runs in the session named by the context id', async () => {
    const runner = new FakeRunner(() => [textEvent('ok')]);
    const bus = new RecordingBus();

    await new A2aAgentExecutor(runner).execute(requestContext('hi'), bus);

    expect(runner.sessionService.createSession).toHaveBeenCalledWith({
      appName: 'fake_app',
      userId: 'A2A_USER_ctx-1',
      sessionId: 'ctx-1',
      state: {},
    });
    expect(runner.calls[0]).toMatchObject({
      userId: 'A2A_USER_ctx-1',
      sessionId: 'ctx-1',
    });
    expect(bus.events[1]).toMatchObject({
      metadata: {
        a2a_relay_app_name: 'fake_app',
        a2a_relay_user_id: 'A2A_USER_ctx-1',
        a2a_relay_session_id: 'ctx-1',
      },
    });
  });

  it('reuses an existing session', async () => {
    const runner = new FakeRunner(() => [textEvent('ok')]);
    const executor = new A2aAgentExecutor(runner);

    await executor.execute(requestContext('one'), new RecordingBus());
    await executor.execute(requestContext('two'), new RecordingBus());

    expect(runner.sessionService.createSession).toHaveBeenCalledTimes(1);
    expect(runner.calls.map(userText)).toEqual(['one', 'two']);
  });

  it('resolves a runner factory once', async () => {
    const runner = new FakeRunner(() => [textEvent('ok')]);
    const factory = vi.fn(async () => runner);
    const executor = new A2aAgentExecutor(factory);

    await executor.execute(requestContext('one'), new RecordingBus());
    await executor.execute(requestContext('two'), new RecordingBus());

    expect(factory).toHaveBeenCalledTimes(1);
  });

  it('fails the task when the agent reports an error', async () => {
    const runner = new FakeRunner(() => [
      createEvent({
        invocationId: 'inv-1',
        author: 'fake_app',
        errorCode: 'MODEL_ERROR',
        errorMessage: 'model unavailable',
      }),
    ]);
    const bus = new RecordingBus();

    await new A2aAgentExecutor(runner).execute(requestContext('hi'), bus);

    expect(bus.states()).toEqual(['task', 'working', 'failed', 'failed']);
    expect(bus.events[3]).toMatchObject({
      final: true,
      status: {
        state: 'failed',
        message: {parts: [{kind: 'text', text: 'model unavailable'}]},
      },
    });
  });

  it('fails the task when the agent produces no answer', async () => {
    const runner = new FakeRunner(() => []);
    const bus = new RecordingBus();

    await new A2aAgentExecutor(runner).execute(requestContext('hi'), bus);

    expect(bus.states()).toEqual(['task', 'working', 'failed']);
    expect(bus.events[2]).toMatchObject({
      final: true,
      status: {message: {parts: [{kind: 'text', text: 'Agent produced no response'}]}},
    });
  });

  it('fails the task when the runner throws', async () => {
    vi.spyOn(logger, 'error').mockImplementation(() => {});
    const runner = new FakeRunner(() => {
      throw new Error('runner exploded');
    });
    const bus = new RecordingBus();

    await new A2aAgentExecutor(runner).execute(requestContext('hi'), bus);

    expect(bus.states()).toEqual(['task', 'working', 'failed']);
    expect(bus.events[2]).toMatchObject({
      final: true,
      status: {message: {parts: [{kind: 'text', text: 'runner exploded'}]}},
    });
    expect(logger.error).toHaveBeenCalledWith(
      'Error handling A2A request for task task-1: runner exploded'
    );
    expect(bus.finishedCount).toBe(1);
  });
});
