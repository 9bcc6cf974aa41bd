/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * A2A wire types. Protocol objects come from @a2a-js/sdk; the JSON-RPC
 * envelope the relay client sends adds a top-level `metadata`.
 */

export type {
  Artifact as A2AArtifact,
  DataPart as A2ADataPart,
  FilePart as A2AFilePart,
  FileWithBytes as A2AFileWithBytes,
  FileWithUri as A2AFileWithUri,
  Message as A2AMessage,
  MessageSendParams,
  Part as A2APart,
  Task as A2ATask,
  TaskArtifactUpdateEvent as A2ATaskArtifactUpdateEvent,
  TaskState as A2ATaskState,
  TaskStatus as A2ATaskStatus,
  TaskStatusUpdateEvent as A2ATaskStatusUpdateEvent,
  TextPart as A2ATextPart,
} from '@a2a-js/sdk';

export type JsonRpcId = string | number | null;

export interface JsonRpcRequest<TParams = unknown> {
  jsonrpc: '2.0';
  id: JsonRpcId;
  method: string;
  params?: TParams;
  /**
   * Envelope level metadata. Not part of JSON-RPC proper; callers use it to
   * carry a tracing thread id next to the call.
   */
  metadata?: Record<string, unknown>;
}

export const MESSAGE_SEND_METHOD = 'message/send';
