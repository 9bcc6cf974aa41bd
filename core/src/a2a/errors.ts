/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Error thrown when a call to a remote A2A endpoint fails.
 */
export class A2AClientError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number
  ) {
    super(message);
    this.name = 'A2AClientError';
  }
}

/**
 * The endpoint could not be reached or answered with a non-200 status.
 */
export class A2ATransportError extends A2AClientError {
  constructor(message: string, statusCode?: number) {
    super(message, statusCode);
    this.name = 'A2ATransportError';
  }
}

/**
 * The endpoint answered, but not with a usable `result`.
 */
export class A2AProtocolError extends A2AClientError {
  constructor(message: string, statusCode?: number) {
    super(message, statusCode);
    this.name = 'A2AProtocolError';
  }
}
