/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Match-run observer, used by the progress view.
 */

import type { FieldMatch } from '../core/types.js';

export interface UnmatchedLine {
  lineIndex: number;
  rawLog: string;
  /** Field boundaries reached, when trace mode is on. */
  trace?: string;
}

export interface MatchObserver {
  onCompiled?(info: { specialization: string; pattern: string; fields: readonly string[] }): void;
  onBatchProgress?(info: { current: number; total?: number; processedLines: number }): void;
  onMatched?(info: { lineIndex: number; match: FieldMatch }): void;
  onUnmatched?(line: UnmatchedLine): void;
}
