/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type express from 'express';
import type * as http from 'http';

import {logger} from '../../utils/logger.js';

/**
 * Binds an A2A express app to a host and port.
 */
export class A2aServer {
  private server?: http.Server;

  constructor(
    readonly app: express.Express,
    private readonly host: string,
    private readonly port: number
  ) {}

  /** Port actually bound, which differs from the requested one for port 0. */
  get boundPort(): number | undefined {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address.port : undefined;
  }

  start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.port, this.host, () => {
        logger.info(`A2A endpoint listening on http://${this.host}:${this.boundPort ?? this.port}/`);
        resolve();
      });
      server.once('error', reject);
      this.server = server;
    });
  }

  stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return Promise.resolve();
    }
    return new Promise((resolve, reject) => {
      server.close((err) => {
        if (err) {
          reject(err);
          return;
        }
        this.server = undefined;
        logger.info('A2A endpoint stopped');
        resolve();
      });
    });
  }
}
