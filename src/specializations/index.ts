/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export * from './file-specialization-store.js';
export * from './specialization-file.js';
