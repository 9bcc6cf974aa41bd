/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {randomUUID} from 'node:crypto';

import {isRecord} from '../a2a/converters/utils.js';
import {A2AProtocolError, A2ATransportError} from '../a2a/errors.js';
import {buildA2aRequestLog, buildA2aResponseLog} from '../a2a/logs/log_utils.js';
import {
  jsonRpcErrorObjectSchema,
  sendMessageResultSchema,
} from '../a2a/schemas.js';
import {
  type A2AMessage,
  type JsonRpcRequest,
  MESSAGE_SEND_METHOD,
  type MessageSendParams,
} from '../a2a/types.js';
import {logger} from '../utils/logger.js';

/** Characters of a failed response body kept in the error message. */
export const ERROR_BODY_PREVIEW_LENGTH = 200;

export interface A2AEndpoint {
  /** Label used in logs and relay output. */
  name: string;
  /** JSON-RPC URL of the endpoint. */
  url: string;
  /**
   * Also send the message id as `params.messageId`. LangGraph's A2A server
   * reads it from there.
   */
  echoMessageIdInParams?: boolean;
}

export interface SendMessageRequest {
  text: string;
  /** Sent as top-level `metadata.thread_id`. */
  threadId: string;
  contextId?: string;
  taskId?: string;
}

export interface SendMessageResult {
  /** Text of the first part of the first artifact. */
  text: string;
  taskId?: string;
  contextId?: string;
}

/**
 * Anything that can take one relay turn. `A2AEndpointClient` is the real
 * one.
 */
export interface MessageSender {
  readonly name: string;
  sendMessage(request: SendMessageRequest): Promise<SendMessageResult>;
}

type MessageSendPayload = JsonRpcRequest<MessageSendParams & {messageId?: string}>;

/**
 * Builds the JSON-RPC body for one turn. Only ids the caller passes are
 * included.
 */
export function buildSendMessagePayload(
  request: SendMessageRequest,
  options: {echoMessageIdInParams?: boolean} = {}
): MessageSendPayload {
  const message: A2AMessage = {
    kind: 'message',
    role: 'user',
    parts: [{kind: 'text', text: request.text}],
    messageId: randomUUID(),
  };
  if (request.contextId) message.contextId = request.contextId;
  if (request.taskId) message.taskId = request.taskId;

  return {
    jsonrpc: '2.0',
    id: randomUUID(),
    method: MESSAGE_SEND_METHOD,
    params: options.echoMessageIdInParams
      ? {message, messageId: message.messageId}
      : {message},
    metadata: {thread_id: request.threadId},
  };
}

/**
 * Reads the reply of a `message/send` call.
 *
 * @throws A2AProtocolError when the body has an `error`, lacks `result`, or
 *     the result has no artifact text.
 */
export function parseSendMessageResponse(body: unknown): SendMessageResult {
  if (!isRecord(body)) {
    throw new A2AProtocolError('Response is not a JSON object');
  }
  if (body.error !== undefined && body.error !== null) {
    const error = jsonRpcErrorObjectSchema.safeParse(body.error);
    throw new A2AProtocolError(
      (error.success ? error.data.message : undefined) || 'Unknown error'
    );
  }
  if (!('result' in body)) {
    throw new A2AProtocolError("Response missing 'result' key");
  }

  const parsed = sendMessageResultSchema.safeParse(body.result);
  if (!parsed.success) {
    throw new A2AProtocolError('Response result is not a task');
  }
  const result = parsed.data;
  logger.debug(buildA2aResponseLog(result));

  const text = result.artifacts?.[0]?.parts?.[0]?.text;
  if (text === undefined) {
    const state = result.status?.state ?? 'unknown';
    throw new A2AProtocolError(
      `Response has no artifact text (task ${result.id ?? 'N/A'} is ${state})`
    );
  }

  return {text, taskId: result.id, contextId: result.contextId};
}

/**
 * Sends turns to one A2A endpoint over JSON-RPC.
 */
export class A2AEndpointClient implements MessageSender {
  constructor(private readonly endpoint: A2AEndpoint) {}

  get name(): string {
    return this.endpoint.name;
  }

  get url(): string {
    return this.endpoint.url;
  }

  /**
   * @throws A2ATransportError on connection failure or a non-200 status.
   * @throws A2AProtocolError when the reply is not a usable result.
   */
  async sendMessage(request: SendMessageRequest): Promise<SendMessageResult> {
    const payload = buildSendMessagePayload(request, {
      echoMessageIdInParams: this.endpoint.echoMessageIdInParams,
    });
    logger.debug(buildA2aRequestLog(payload));

    let response: Response;
    let bodyText: string;
    try {
      response = await fetch(this.endpoint.url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
        body: JSON.stringify(payload),
      });
      bodyText = await response.text();
    } catch (e: unknown) {
      const reason = e instanceof Error ? e.message : String(e);
      throw new A2ATransportError(`Exception: ${reason}`);
    }

    if (response.status !== 200) {
      throw new A2ATransportError(
        `Error ${response.status}: ${bodyText.slice(0, ERROR_BODY_PREVIEW_LENGTH)}`,
        response.status
      );
    }

    let body: unknown;
    try {
      body = JSON.parse(bodyText);
    } catch (e: unknown) {
      const reason = e instanceof Error ? e.message : String(e);
      throw new A2AProtocolError(`Exception: ${reason}`, response.status);
    }

    return parseSendMessageResponse(body);
  }
}
