/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export * from './core/index.js';
export * from './specializations/index.js';
export { runLogMatch, type LogMatchOptions, type LogMatchResult } from './runner/index.js';
export type { MatchObserver, UnmatchedLine } from './types/index.js';
