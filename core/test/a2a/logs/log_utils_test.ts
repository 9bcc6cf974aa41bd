/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {describe, expect, it} from 'vitest';

import {
  buildA2aRequestLog,
  buildA2aResponseLog,
  buildMessagePartLog,
} from '../../../src/a2a/logs/log_utils.js';

const SEPARATOR = '-'.repeat(59);

describe('buildMessagePartLog', () => {
  it('logs text parts', () => {
    expect(buildMessagePartLog({kind: 'text', text: 'Hello'})).toBe(
      'TextPart: Hello'
    );
  });

  it('truncates long text', () => {
    expect(buildMessagePartLog({kind: 'text', text: 'a'.repeat(120)})).toBe(
      `TextPart: ${'a'.repeat(100)}...`
    );
  });

  it('summarizes nested data values and shows metadata', () => {
    const log = buildMessagePartLog({
      kind: 'data',
      data: {name: 'calc', args: {a: 1}, list: [1]},
      metadata: {a2a_relay_type: 'function_call'},
    });

    expect(log).toBe(
      [
        'DataPart: {',
        '  "name": "calc",',
        '  "args": "<object>",',
        '  "list": "<Array>"',
        '}',
        '    Part Metadata: {',
        '      "a2a_relay_type": "function_call"',
        '    }',
      ].join('\n')
    );
  });

  it('leaves file bytes out', () => {
    expect(
      buildMessagePartLog({
        kind: 'file',
        file: {bytes: 'AAAA', mimeType: 'image/png'},
      })
    ).toBe(
      [
        'FilePart: {',
        '  "bytes": "<bytes excluded>",',
        '  "mimeType": "image/png"',
        '}',
      ].join('\n')
    );
  });
});

describe('buildA2aRequestLog', () => {
  it('describes the message and the envelope metadata', () => {
    const log = buildA2aRequestLog({
      jsonrpc: '2.0',
      id: 'req-1',
      method: 'message/send',
      params: {
        message: {
          kind: 'message',
          role: 'user',
          messageId: 'm-1',
          contextId: 'ctx-1',
          parts: [{kind: 'text', text: 'Hello'}],
        },
      },
      metadata: {thread_id: 't-1'},
    });

    expect(log).toBe(
      [
        '',
        'A2A Send Message Request:',
        SEPARATOR,
        'Request ID: req-1',
        'Message:',
        '  ID: m-1',
        '  Role: user',
        '  Task ID: N/A',
        '  Context ID: ctx-1',
        '  Metadata:',
        '  {',
        '    "thread_id": "t-1"',
        '  }',
        SEPARATOR,
        'Message Parts:',
        'Part 0: TextPart: Hello',
        SEPARATOR,
        '',
      ].join('\n')
    );
  });
});

describe('buildA2aResponseLog', () => {
  it('describes the task and its artifacts', () => {
    const log = buildA2aResponseLog({
      id: 'task-1',
      contextId: 'ctx-1',
      status: {state: 'completed', timestamp: '2025-01-01T00:00:00.000Z'},
      history: [{}, {}],
      artifacts: [{parts: [{text: 'x'.repeat(150)}, {}]}],
    });

    expect(log).toBe(
      [
        '',
        'A2A Response:',
        SEPARATOR,
        'Task ID: task-1',
        'Context ID: ctx-1',
        'Status State: completed',
        'Status Timestamp: 2025-01-01T00:00:00.000Z',
        'History Length: 2',
        'Artifacts Count: 1',
        SEPARATOR,
        'Artifacts:',
        `Artifact 0 Part 0: ${'x'.repeat(100)}...`,
        'Artifact 0 Part 1: {}',
        SEPARATOR,
        '',
      ].join('\n')
    );
  });

  it('handles an empty result', () => {
    const log = buildA2aResponseLog({});

    expect(log).toContain('\nTask ID: N/A\n');
    expect(log).toContain('\nStatus State: N/A\n');
    expect(log).toContain('\nArtifacts:\nNo artifacts\n');
  });
});
