/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {z} from 'zod';

const threadIdHolderSchema = z
  .object({thread_id: z.string().min(1).optional().catch(undefined)})
  .passthrough()
  .optional()
  .catch(undefined);

/**
 * Partial view of a request body that only looks for the thread id, at the
 * envelope level or under `params`. Malformed fields read as absent.
 */
export const threadMetadataEnvelopeSchema = z
  .object({
    metadata: threadIdHolderSchema,
    params: z
      .object({metadata: threadIdHolderSchema})
      .passthrough()
      .optional()
      .catch(undefined),
  })
  .passthrough();

const optionalId = z.string().min(1).optional().catch(undefined);

/**
 * Partial view of a `message/send` result. Other fields are dropped and
 * malformed ones read as absent.
 */
export const sendMessageResultSchema = z.object({
  id: optionalId,
  contextId: optionalId,
  status: z
    .object({state: z.string().optional().catch(undefined)})
    .optional()
    .catch(undefined),
  artifacts: z
    .array(
      z.object({
        parts: z
          .array(z.object({text: z.string().optional().catch(undefined)}))
          .optional()
          .catch(undefined),
      })
    )
    .optional()
    .catch(undefined),
});

export const jsonRpcErrorObjectSchema = z.object({
  code: z.number().optional().catch(undefined),
  message: z.string().optional().catch(undefined),
});

export type SendMessageResultView = z.infer<typeof sendMessageResultSchema>;

/**
 * Renders zod issues as "path: message; ...".
 */
export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join('; ');
}
