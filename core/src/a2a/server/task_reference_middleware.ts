/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {A2AError, type TaskStore} from '@a2a-js/sdk/server';
import type {RequestHandler} from 'express';
import {z} from 'zod';

import {logger} from '../../utils/logger.js';
import {MESSAGE_SEND_METHOD} from '../types.js';

const referencingSendSchema = z
  .object({
    id: z.union([z.string(), z.number(), z.null()]).optional(),
    method: z.literal(MESSAGE_SEND_METHOD),
    params: z
      .object({
        message: z
          .object({
            taskId: z.string().min(1),
            contextId: z.string().min(1).optional(),
            referenceTaskIds: z.array(z.string()).optional(),
          })
          .passthrough(),
      })
      .passthrough(),
  })
  .passthrough();

type ReferencingSend = z.infer<typeof referencingSendSchema>;

/**
 * Decodes a buffered body for the JSON-RPC handler. Text that is not JSON
 * is handed on as is so the handler reports the parse error.
 */
export function decodeJsonBody(body: unknown): unknown {
  if (!Buffer.isBuffer(body)) {
    return body;
  }
  const text = body.toString();
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

/**
 * Moves the message's `taskId` into `referenceTaskIds`, so the turn starts a
 * new task that follows the referenced one.
 */
function followReferencedTask(
  request: ReferencingSend,
  contextId: string
) {
  const {taskId, ...message} = request.params.message;
  return {
    ...request,
    params: {
      ...request.params,
      message: {
        ...message,
        contextId: message.contextId ?? contextId,
        referenceTaskIds: [...(message.referenceTaskIds ?? []), taskId],
      },
    },
  };
}

/**
 * Every `message/send` starts a new task. A `taskId` on the message names an
 * earlier task of the same conversation: it must exist and share the
 * message's context, and is passed on as a reference.
 *
 * Runs after the raw body parser and replaces the buffered body with the
 * decoded request.
 */
export function createTaskReferenceMiddleware(taskStore: TaskStore): RequestHandler {
  return async (req, res, next) => {
    const body = decodeJsonBody(req.body);
    req.body = body;

    const parsed = referencingSendSchema.safeParse(body);
    if (!parsed.success) {
      next();
      return;
    }
    const request = parsed.data;
    const {taskId, contextId} = request.params.message;

    let error: A2AError | undefined;
    try {
      const referenced = await taskStore.load(taskId);
      if (!referenced) {
        error = A2AError.taskNotFound(taskId);
      } else if (contextId && referenced.contextId !== contextId) {
        error = A2AError.invalidParams(
          `task ${taskId} belongs to a different context`
        );
      } else {
        logger.debug(`message/send follows task ${taskId}`);
        req.body = followReferencedTask(request, referenced.contextId);
      }
    } catch (e: unknown) {
      next(e);
      return;
    }

    if (error) {
      res.json({jsonrpc: '2.0', id: request.id ?? null, error: error.toJSONRPCError()});
      return;
    }
    next();
  };
}
