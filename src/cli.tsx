#!/usr/bin/env node
/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describeError } from './core/errors.js';
import { logConsole } from './core/logging.js';
import { main } from './cli/main.js';

main().catch((error: unknown) => {
  logConsole('error', 'failed', [
    ['error', describeError(error)],
    ['kind', error instanceof Error ? error.name : undefined],
  ]);
  process.exit(1);
});
