/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { join } from 'node:path';
import { randomUUID } from 'node:crypto';
import { LogRegexp } from '../core/log-regexp.js';
import { BufferedTraceSink } from '../core/logging.js';
import type { CaptureItem, Specialization } from '../core/types.js';
import type { MatchObserver, UnmatchedLine } from '../types/observer.js';
import { writeMatchReport, type MatchedLine } from '../tools/index.js';
import { countLogLines, streamLogBatches } from './batch-processor.js';
import { writeFailureReport } from './report-writers.js';

export interface LogMatchOptions {
  inputPath: string;
  outputDir: string;
  specialization: Specialization;
  format?: string;
  capture?: readonly CaptureItem[];
  trace?: boolean;
  limit?: number;
  batchSize?: number;
  runId?: string;
  observer?: MatchObserver;
}

export interface LogMatchResult {
  runId: string;
  pattern: string;
  fields: string[];
  totalLines: number;
  matched: number;
  unmatched: number;
  reportPath: string;
  failureReportPath?: string;
}

/**
 * Compiles the template once and matches every line of a log file.
 * Matches go to a CSV report, unmatched lines to a JSON failure report.
 */
export async function runLogMatch(options: LogMatchOptions): Promise<LogMatchResult> {
  const runId = options.runId ?? randomUUID();
  const batchSize = Math.max(1, options.batchSize ?? 10_000);
  const reportPath = join(options.outputDir, `${runId}-matches.csv`);
  const failureReportPath = join(options.outputDir, `${runId}-failures.json`);
  const traceSink = new BufferedTraceSink();

  const log = new LogRegexp(options.specialization, {
    format: options.format,
    capture: options.capture,
    trace: options.trace,
    traceSink,
  });
  const compiled = log.compile();
  const fields = [...compiled.fields];
  options.observer?.onCompiled?.({
    specialization: options.specialization.name,
    pattern: compiled.source,
    fields,
  });

  const totalLines = await countLogLines(options.inputPath, options.limit);
  const totalBatches = Math.ceil(totalLines / batchSize);
  const failures: UnmatchedLine[] = [];
  let matched = 0;
  let processed = 0;
  let batchNumber = 0;
  let reportInitialized = false;

  for await (const batch of streamLogBatches(options.inputPath, batchSize, options.limit)) {
    batchNumber += 1;
    const matchedLines: MatchedLine[] = [];
    for (const line of batch) {
      const match = compiled.exec(line.raw);
      const trace = options.trace ? traceSink.drain() : undefined;
      if (match) {
        matchedLines.push({ lineIndex: line.index, raw: line.raw, values: match.values });
        options.observer?.onMatched?.({ lineIndex: line.index, match });
        continue;
      }
      const failure: UnmatchedLine = { lineIndex: line.index, rawLog: line.raw, trace };
      failures.push(failure);
      options.observer?.onUnmatched?.(failure);
    }
    matched += matchedLines.length;
    processed += batch.length;

    await writeMatchReport(matchedLines, {
      filePath: reportPath,
      fields,
      append: reportInitialized,
      includeHeader: !reportInitialized,
    });
    reportInitialized = true;
    options.observer?.onBatchProgress?.({
      current: batchNumber,
      total: totalBatches,
      processedLines: processed,
    });
  }

  if (!reportInitialized) {
    await writeMatchReport([], { filePath: reportPath, fields });
  }
  if (failures.length > 0) {
    await writeFailureReport(
      failureReportPath,
      {
        specialization: options.specialization.name,
        format: log.getFormat(),
        pattern: compiled.source,
      },
      failures,
    );
  }

  return {
    runId,
    pattern: compiled.source,
    fields,
    totalLines: processed,
    matched,
    unmatched: failures.length,
    reportPath,
    failureReportPath: failures.length > 0 ? failureReportPath : undefined,
  };
}
