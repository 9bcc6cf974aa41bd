/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {randomUUID} from 'node:crypto';
import {setTimeout as sleep} from 'node:timers/promises';

import {A2AClientError} from '../a2a/errors.js';
import {logger} from '../utils/logger.js';
import type {
  MessageSender,
  SendMessageRequest,
  SendMessageResult,
} from './a2a_endpoint_client.js';

export const DEFAULT_ROUND_DELAY_MS = 500;

export type RelayState =
  | 'INIT'
  | 'ROUND_SEND_A'
  | 'ROUND_SEND_B'
  | 'DONE'
  | 'ABORTED';

export type RelaySide = 'A' | 'B';

/** Identifiers an endpoint has assigned to this conversation so far. */
export interface EndpointThreadState {
  contextId?: string;
  taskId?: string;
}

export interface RelayTurn {
  round: number;
  side: RelaySide;
  endpoint: string;
  sent: string;
  received: string;
  taskId?: string;
  contextId?: string;
}

export interface RelaySnapshot {
  threadId: string;
  endpoints: Record<RelaySide, EndpointThreadState>;
}

export interface RelayFailure {
  round: number;
  side: RelaySide;
  endpoint: string;
  message: string;
}

export interface RelayObserver {
  onRoundStart?(round: number, snapshot: RelaySnapshot): void;
  onSend?(side: RelaySide, endpoint: string, text: string): void;
  onReply?(turn: RelayTurn): void;
  onAbort?(failure: RelayFailure): void;
}

export interface RelayOptions {
  rounds: number;
  initialMessage: string;
  /** Pause after each full round (default: 500). */
  roundDelayMs?: number;
  /** Send each endpoint's last task id with its next message (default: true). */
  referenceTasks?: boolean;
  /** Thread id to start from (default: a new UUID). */
  threadId?: string;
  observer?: RelayObserver;
  sleep?: (ms: number) => Promise<unknown>;
}

export interface RelayOutcome {
  state: 'DONE' | 'ABORTED';
  roundsCompleted: number;
  transcript: RelayTurn[];
  threadId: string;
  endpoints: Record<RelaySide, EndpointThreadState>;
  error?: RelayFailure;
}

class RelayAbort extends Error {
  constructor(readonly failure: RelayFailure) {
    super(failure.message);
    this.name = 'RelayAbort';
  }
}

/**
 * Relays a conversation between two A2A endpoints: A's reply is B's next
 * input and B's reply is A's, for a fixed number of rounds.
 *
 * Each endpoint only ever sees the context and task ids it assigned itself.
 * The shared thread id follows the most recently assigned context id and is
 * used as `thread_id` for an endpoint that has not assigned one yet. The
 * first failed call ends the run; nothing is retried.
 */
export class ConversationRelay {
  private _state: RelayState = 'INIT';
  private threadId = '';
  private readonly threads: Record<RelaySide, EndpointThreadState> = {
    A: {},
    B: {},
  };

  constructor(
    private readonly endpointA: MessageSender,
    private readonly endpointB: MessageSender
  ) {}

  get state(): RelayState {
    return this._state;
  }

  async run(options: RelayOptions): Promise<RelayOutcome> {
    if (this._state !== 'INIT') {
      throw new Error(`Relay already ran (state ${this._state})`);
    }
    if (!Number.isInteger(options.rounds) || options.rounds < 1) {
      throw new RangeError(`rounds must be a positive integer, got ${options.rounds}`);
    }

    const {
      rounds,
      initialMessage,
      roundDelayMs = DEFAULT_ROUND_DELAY_MS,
      referenceTasks = true,
      observer = {},
    } = options;
    const wait = options.sleep ?? sleep;
    this.threadId = options.threadId ?? randomUUID();

    const transcript: RelayTurn[] = [];
    let roundsCompleted = 0;
    let message = initialMessage;

    try {
      for (let round = 1; round <= rounds; round++) {
        observer.onRoundStart?.(round, this.snapshot());

        this._state = 'ROUND_SEND_A';
        const turnA = await this.send('A', round, message, referenceTasks, observer);
        transcript.push(turnA);

        this._state = 'ROUND_SEND_B';
        const turnB = await this.send('B', round, turnA.received, referenceTasks, observer);
        transcript.push(turnB);

        message = turnB.received;
        roundsCompleted = round;
        if (roundDelayMs > 0) {
          await wait(roundDelayMs);
        }
      }
    } catch (e: unknown) {
      if (!(e instanceof RelayAbort)) {
        throw e;
      }
      this._state = 'ABORTED';
      observer.onAbort?.(e.failure);
      return {
        state: 'ABORTED',
        roundsCompleted,
        transcript,
        ...this.snapshot(),
        error: e.failure,
      };
    }

    this._state = 'DONE';
    return {state: 'DONE', roundsCompleted, transcript, ...this.snapshot()};
  }

  private async send(
    side: RelaySide,
    round: number,
    text: string,
    referenceTasks: boolean,
    observer: RelayObserver
  ): Promise<RelayTurn> {
    const endpoint = side === 'A' ? this.endpointA : this.endpointB;
    const thread = this.threads[side];
    const request: SendMessageRequest = {
      text,
      threadId: thread.contextId ?? this.threadId,
      contextId: thread.contextId,
      taskId: referenceTasks ? thread.taskId : undefined,
    };

    observer.onSend?.(side, endpoint.name, text);

    let result: SendMessageResult;
    try {
      result = await endpoint.sendMessage(request);
    } catch (e: unknown) {
      const message =
        e instanceof A2AClientError
          ? e.message
          : `Exception: ${e instanceof Error ? e.message : String(e)}`;
      logger.warn(`${endpoint.name} failed in round ${round}: ${message}`);
      throw new RelayAbort({round, side, endpoint: endpoint.name, message});
    }

    if (result.taskId) {
      thread.taskId = result.taskId;
    }
    if (result.contextId) {
      thread.contextId = result.contextId;
      this.threadId = result.contextId;
    }

    const turn: RelayTurn = {
      round,
      side,
      endpoint: endpoint.name,
      sent: text,
      received: result.text,
      taskId: thread.taskId,
      contextId: thread.contextId,
    };
    observer.onReply?.(turn);
    return turn;
  }

  private snapshot(): RelaySnapshot {
    return {
      threadId: this.threadId,
      endpoints: {A: {...this.threads.A}, B: {...this.threads.B}},
    };
  }
}
