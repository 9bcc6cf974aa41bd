/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {defineConfig} from 'vitest/config';

export default defineConfig({
  test: {
    include: ['core/test/**/*_test.ts', 'dev/test/**/*_test.ts'],
    environment: 'node',
  },
});
