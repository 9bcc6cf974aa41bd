/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/** Prefix for relay specific metadata keys in A2A parts and events. */
export const RELAY_METADATA_KEY_PREFIX = 'a2a_relay_';

/** Prefix of the user id derived from an A2A context id. */
export const A2A_USER_ID_PREFIX = 'A2A_USER_';

/**
 * Gets the metadata key with the relay prefix.
 *
 * @throws Error if key is empty.
 */
export function getRelayMetadataKey(key: string): string {
  if (!key) {
    throw new Error('Metadata key cannot be empty or undefined');
  }
  return `${RELAY_METADATA_KEY_PREFIX}${key}`;
}

/**
 * Derives the runner user id for an A2A conversation.
 */
export function toA2aUserId(contextId: string): string {
  if (!contextId) {
    throw new Error('contextId must be non-empty');
  }
  return `${A2A_USER_ID_PREFIX}${contextId}`;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
