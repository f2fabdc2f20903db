/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { UnmatchedLine } from '../types/observer.js';
import { writeJsonFile } from '../tools/files.js';

export interface FailureReportContext {
  specialization: string;
  format: string;
  pattern: string;
}

/**
 * Writes the lines that did not match to a JSON file.
 *
 * @param path - Output file path
 * @param failures - Unmatched lines, with traces when trace mode was on
 */
export async function writeFailureReport(
  path: string,
  context: FailureReportContext,
  failures: UnmatchedLine[],
): Promise<void> {
  const report = {
    timestamp: new Date().toISOString(),
    ...context,
    totalFailures: failures.length,
    failures: failures.map((failure) => ({
      lineIndex: failure.lineIndex,
      rawLog: failure.rawLog,
      reachedFields: failure.trace?.trim().split(/\s+/).filter((name) => name.length > 0),
    })),
  };
  await writeJsonFile(path, report);
}
