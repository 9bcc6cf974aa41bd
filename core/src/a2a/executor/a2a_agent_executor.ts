/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * A2A Agent Executor - Runs an agent against A2A requests and publishes
 * updates to the request's event bus.
 */

import {randomUUID} from 'node:crypto';
import {
  A2AError,
  type AgentExecutor,
  type ExecutionEventBus,
  type RequestContext,
} from '@a2a-js/sdk/server';
import type {Content} from '@google/genai';
import type {Event} from '@google/adk';

import {logger} from '../../utils/logger.js';
import {
  type A2APartToGenAIPartConverter,
  type GenAIPartToA2APartConverter,
  convertA2aPartToGenaiPart,
  convertGenaiPartToA2aPart,
} from '../converters/part_converter.js';
import {
  type A2ARequestContext,
  type A2ARequestToAgentRunRequestConverter,
  convertA2aRequestToAgentRunRequest,
} from '../converters/request_converter.js';
import {
  type A2AEvent,
  type AdkEventToA2AEventsConverter,
  convertEventToA2aEvents,
} from '../converters/event_converter.js';
import {getRelayMetadataKey} from '../converters/utils.js';
import type {A2AMessage, A2ATask, A2ATaskStatus} from '../types.js';
import {TaskResultAggregator} from './task_result_aggregator.js';

export interface AgentSessionRef {
  id: string;
}

export interface AgentSessionKey {
  appName: string;
  userId: string;
  sessionId: string;
}

/**
 * The part of a runner the executor relies on. `Runner` from @google/adk
 * satisfies it.
 */
export interface AgentRunner {
  readonly appName: string;
  readonly sessionService: {
    getSession(request: AgentSessionKey): Promise<AgentSessionRef | undefined | null>;
    createSession(
      request: AgentSessionKey & {state?: Record<string, unknown>}
    ): Promise<AgentSessionRef>;
  };
  runAsync(request: {
    userId: string;
    sessionId: string;
    newMessage: Content;
  }): AsyncIterable<Event>;
}

export interface A2aAgentExecutorConfig {
  a2aPartConverter?: A2APartToGenAIPartConverter;
  genAiPartConverter?: GenAIPartToA2APartConverter;
  requestConverter?: A2ARequestToAgentRunRequestConverter;
  eventConverter?: AdkEventToA2AEventsConverter;
}

export type RunnerFactory = () => AgentRunner | Promise<AgentRunner>;

/**
 * Runs the agent for one A2A turn and publishes the task lifecycle: the
 * submitted task, working, the converted agent events, then the artifact and
 * completed, or a final failed status.
 */
export class A2aAgentExecutor implements AgentExecutor {
  private _runner: AgentRunner | RunnerFactory;
  private readonly _config: Required<A2aAgentExecutorConfig>;

  constructor(runner: AgentRunner | RunnerFactory, config?: A2aAgentExecutorConfig) {
    this._runner = runner;
    this._config = {
      a2aPartConverter: config?.a2aPartConverter ?? convertA2aPartToGenaiPart,
      genAiPartConverter: config?.genAiPartConverter ?? convertGenaiPartToA2aPart,
      requestConverter:
        config?.requestConverter ?? convertA2aRequestToAgentRunRequest,
      eventConverter: config?.eventConverter ?? convertEventToA2aEvents,
    };
  }

  private async resolveRunner(): Promise<AgentRunner> {
    if (typeof this._runner !== 'function') {
      return this._runner;
    }
    const resolved = await this._runner();
    this._runner = resolved;
    return resolved;
  }

  /**
   * A turn runs to completion inside one blocking `message/send`, so there
   * is never a running task left to cancel.
   */
  async cancelTask(taskId: string, _eventBus: ExecutionEventBus): Promise<void> {
    throw A2AError.taskNotCancelable(taskId);
  }

  async execute(
    requestContext: RequestContext,
    eventBus: ExecutionEventBus
  ): Promise<void> {
    if (!requestContext.task) {
      eventBus.publish(this.submittedTask(requestContext));
    }

    let finalState = 'submitted';
    const publish = (event: A2AEvent) => {
      if (event.kind === 'status-update') {
        finalState = event.status.state;
      }
      eventBus.publish(event);
    };

    try {
      await this.handleRequest(requestContext, publish);
    } catch (e: unknown) {
      const reason = e instanceof Error ? e.message : String(e);
      logger.error(
        `Error handling A2A request for task ${requestContext.taskId}: ${reason}`
      );
      publish(
        this.statusEvent(
          requestContext,
          {state: 'failed', message: this.agentMessage(requestContext, reason)},
          true
        )
      );
    } finally {
      eventBus.finished();
    }
    logger.debug(`Task ${requestContext.taskId} ended as ${finalState}`);
  }

  private async handleRequest(
    context: A2ARequestContext,
    publish: (event: A2AEvent) => void
  ): Promise<void> {
    const runner = await this.resolveRunner();
    const runRequest = this._config.requestConverter(
      context,
      this._config.a2aPartConverter
    );
    const session = await this.prepareSession(
      runner,
      runRequest.userId,
      runRequest.sessionId
    );

    const working = this.statusEvent(context, {state: 'working'});
    working.metadata = {
      [getRelayMetadataKey('app_name')]: runner.appName,
      [getRelayMetadataKey('user_id')]: runRequest.userId,
      [getRelayMetadataKey('session_id')]: session.id,
    };
    publish(working);

    const aggregator = new TaskResultAggregator();
    for await (const adkEvent of runner.runAsync({
      userId: runRequest.userId,
      sessionId: session.id,
      newMessage: runRequest.newMessage,
    })) {
      const a2aEvents = this._config.eventConverter(
        adkEvent,
        context.taskId,
        context.contextId,
        this._config.genAiPartConverter
      );
      for (const a2aEvent of a2aEvents) {
        aggregator.processEvent(a2aEvent);
        publish(a2aEvent);
      }
    }

    const taskState = aggregator.taskState;
    const taskStatusMessage = aggregator.taskStatusMessage;

    if (
      taskState === 'working' &&
      taskStatusMessage &&
      taskStatusMessage.parts.length > 0
    ) {
      publish({
        kind: 'artifact-update',
        taskId: context.taskId,
        contextId: context.contextId,
        lastChunk: true,
        artifact: {
          artifactId: randomUUID(),
          parts: taskStatusMessage.parts,
        },
      });
      publish(this.statusEvent(context, {state: 'completed'}, true));
      return;
    }

    publish(
      this.statusEvent(
        context,
        {
          state: taskState === 'working' ? 'failed' : taskState,
          message:
            taskStatusMessage ??
            this.agentMessage(context, 'Agent produced no response'),
        },
        true
      )
    );
  }

  private async prepareSession(
    runner: AgentRunner,
    userId: string,
    sessionId: string
  ): Promise<AgentSessionRef> {
    const key = {appName: runner.appName, userId, sessionId};
    const existing = await runner.sessionService.getSession(key);
    if (existing) {
      return existing;
    }
    logger.debug(`Creating session ${sessionId} for ${userId}`);
    return runner.sessionService.createSession({...key, state: {}});
  }

  private submittedTask(context: RequestContext): A2ATask {
    return {
      kind: 'task',
      id: context.taskId,
      contextId: context.contextId,
      status: {state: 'submitted', timestamp: new Date().toISOString()},
      history: [context.userMessage],
      artifacts: [],
    };
  }

  private agentMessage(context: A2ARequestContext, text: string): A2AMessage {
    return {
      kind: 'message',
      messageId: randomUUID(),
      role: 'agent',
      parts: [{kind: 'text', text}],
      taskId: context.taskId,
      contextId: context.contextId,
    };
  }

  private statusEvent(
    context: A2ARequestContext,
    status: Omit<A2ATaskStatus, 'timestamp'>,
    final = false
  ): Extract<A2AEvent, {kind: 'status-update'}> {
    return {
      kind: 'status-update',
      taskId: context.taskId,
      contextId: context.contextId,
      status: {...status, timestamp: new Date().toISOString()},
      final,
    };
  }
}
