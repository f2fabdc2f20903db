/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export { runLogMatch, type LogMatchOptions, type LogMatchResult } from './log-matcher.js';
export { streamLogBatches, countLogLines, type LogLine } from './batch-processor.js';
export { writeFailureReport, type FailureReportContext } from './report-writers.js';
