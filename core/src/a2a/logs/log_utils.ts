/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Structured log text for A2A requests and responses.
 */

import type {A2APart, JsonRpcRequest, MessageSendParams} from '../types.js';

const NEW_LINE = '\n';
const SEPARATOR = '-----------------------------------------------------------';
const MAX_TEXT_LENGTH = 100;

/**
 * The fields of a task a response log shows. Matches both a server side
 * task and the partial view a client decodes.
 */
export interface A2ATaskForLog {
  id?: string;
  contextId?: string;
  status?: {state?: string; timestamp?: string};
  history?: readonly unknown[];
  artifacts?: ReadonlyArray<{parts?: ReadonlyArray<{text?: string}>}>;
}

function safeSerialize(value: unknown, indent = 2): string {
  try {
    return JSON.stringify(value, null, indent);
  } catch {
    return '<unable to serialize>';
  }
}

function truncate(text: string): string {
  return text.length > MAX_TEXT_LENGTH
    ? text.slice(0, MAX_TEXT_LENGTH) + '...'
    : text;
}

function describePart(part: A2APart): string {
  switch (part.kind) {
    case 'text':
      return `TextPart: ${truncate(part.text)}`;
    case 'data': {
      const summary: Record<string, unknown> = {};
      for (const [key, value] of Object.entries(part.data)) {
        summary[key] =
          typeof value === 'object' && value !== null
            ? `<${Array.isArray(value) ? 'Array' : 'object'}>`
            : value;
      }
      return `DataPart: ${safeSerialize(summary)}`;
    }
    case 'file':
      return `FilePart: ${safeSerialize({
        ...part.file,
        ...('bytes' in part.file ? {bytes: '<bytes excluded>'} : {}),
      })}`;
  }
}

/**
 * One line (plus metadata) describing a message part. File bytes and nested
 * data values are left out.
 */
export function buildMessagePartLog(part: A2APart): string {
  let partContent = describePart(part);
  if (part.metadata && Object.keys(part.metadata).length > 0) {
    const metadata = safeSerialize(part.metadata).replace(/\n/g, '\n    ');
    partContent += `\n    Part Metadata: ${metadata}`;
  }
  return partContent;
}

/**
 * Log text for an outgoing `message/send` call.
 */
export function buildA2aRequestLog(
  request: JsonRpcRequest<MessageSendParams>
): string {
  const message = request.params?.message;
  const partLogs = (message?.parts ?? []).map(
    (part, i) => `Part ${i}: ${buildMessagePartLog(part).replace(/\n/g, '\n  ')}`
  );

  let metadataSection = '';
  if (request.metadata && Object.keys(request.metadata).length > 0) {
    const formatted = safeSerialize(request.metadata).replace(/\n/g, '\n  ');
    metadataSection = `\n  Metadata:\n  ${formatted}`;
  }

  return `
A2A Send Message Request:
${SEPARATOR}
Request ID: ${request.id ?? 'N/A'}
Message:
  ID: ${message?.messageId ?? 'N/A'}
  Role: ${message?.role ?? 'N/A'}
  Task ID: ${message?.taskId ?? 'N/A'}
  Context ID: ${message?.contextId ?? 'N/A'}${metadataSection}
${SEPARATOR}
Message Parts:
${partLogs.length > 0 ? partLogs.join(NEW_LINE) : 'No parts'}
${SEPARATOR}
`;
}

/**
 * Log text for the task a `message/send` call returned.
 */
export function buildA2aResponseLog(task: A2ATaskForLog): string {
  const artifactLogs: string[] = [];
  (task.artifacts ?? []).forEach((artifact, i) => {
    (artifact.parts ?? []).forEach((part, j) => {
      const text = part.text === undefined ? safeSerialize(part, 0) : truncate(part.text);
      artifactLogs.push(`Artifact ${i} Part ${j}: ${text}`);
    });
  });

  return `
A2A Response:
${SEPARATOR}
Task ID: ${task.id ?? 'N/A'}
Context ID: ${task.contextId ?? 'N/A'}
Status State: ${task.status?.state ?? 'N/A'}
Status Timestamp: ${task.status?.timestamp ?? 'N/A'}
History Length: ${task.history?.length ?? 0}
Artifacts Count: ${task.artifacts?.length ?? 0}
${SEPARATOR}
Artifacts:
${artifactLogs.length > 0 ? artifactLogs.join(NEW_LINE) : 'No artifacts'}
${SEPARATOR}
`;
}
