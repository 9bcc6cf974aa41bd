/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type {
  RelayFailure,
  RelayObserver,
  RelayOutcome,
  RelaySide,
  RelaySnapshot,
  RelayTurn,
} from '@a2a-relay/core';

const BANNER = '='.repeat(60);
const RULE = '-'.repeat(60);

/** Replies longer than this are cut in the console output. */
export const REPLY_PREVIEW_LENGTH = 500;

function preview(text: string): string {
  return text.length > REPLY_PREVIEW_LENGTH
    ? `${text.slice(0, REPLY_PREVIEW_LENGTH)}...`
    : text;
}

/**
 * Prints relay progress for a person watching the terminal.
 */
export class ConsoleRelayReporter implements RelayObserver {
  constructor(
    private readonly write: (line: string) => void = (line) => console.log(line)
  ) {}

  start(endpoints: Record<RelaySide, string>, rounds: number): void {
    this.write(BANNER);
    this.write(`Relaying ${rounds} round(s) between:`);
    this.write(`  A: ${endpoints.A}`);
    this.write(`  B: ${endpoints.B}`);
    this.write(BANNER);
  }

  onRoundStart(round: number, snapshot: RelaySnapshot): void {
    this.write('');
    this.write(RULE);
    this.write(`Round ${round}`);
    this.write(`  thread_id: ${snapshot.threadId}`);
    this.write(
      `  A: context=${snapshot.endpoints.A.contextId ?? '-'} task=${snapshot.endpoints.A.taskId ?? '-'}`
    );
    this.write(
      `  B: context=${snapshot.endpoints.B.contextId ?? '-'} task=${snapshot.endpoints.B.taskId ?? '-'}`
    );
    this.write(RULE);
  }

  onSend(side: RelaySide, endpoint: string, text: string): void {
    this.write(`[${side}] -> ${endpoint}: ${preview(text)}`);
  }

  onReply(turn: RelayTurn): void {
    this.write(`[${turn.side}] <- ${turn.endpoint}: ${preview(turn.received)}`);
  }

  onAbort(failure: RelayFailure): void {
    this.write('');
    this.write(
      `Error from ${failure.endpoint} (${failure.side}) in round ${failure.round}: ${failure.message}`
    );
  }

  finish(outcome: RelayOutcome): void {
    this.write('');
    this.write(BANNER);
    if (outcome.state === 'DONE') {
      this.write(`Conversation complete: ${outcome.roundsCompleted} round(s)`);
    } else {
      this.write(
        `Conversation aborted after ${outcome.roundsCompleted} complete round(s)`
      );
    }
    this.write(`thread_id: ${outcome.threadId}`);
    this.write(BANNER);
  }
}
