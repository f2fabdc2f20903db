/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { createReadStream } from 'node:fs';
import readline from 'node:readline';

export interface LogLine {
  /** Zero-based line number in the input file. */
  index: number;
  raw: string;
}

const openLines = (filePath: string) => {
  const stream = createReadStream(filePath, { encoding: 'utf8' });
  const rl = readline.createInterface({ input: stream, crlfDelay: Infinity });
  return { stream, rl };
};

/**
 * Streams a log file in batches. Blank lines are skipped but still count
 * towards line numbers.
 *
 * @param batchSize - Number of lines per batch
 * @param limit - Optional maximum number of non-blank lines
 * @yields Batches of numbered log lines
 */
export async function* streamLogBatches(
  filePath: string,
  batchSize: number,
  limit?: number,
): AsyncGenerator<LogLine[]> {
  const { stream, rl } = openLines(filePath);
  let batch: LogLine[] = [];
  let index = -1;
  let count = 0;
  try {
    for await (const raw of rl) {
      index += 1;
      if (raw.trim().length === 0) {
        continue;
      }
      batch.push({ index, raw });
      count += 1;
      if (batch.length === batchSize) {
        yield batch;
        batch = [];
      }
      if (typeof limit === 'number' && limit > 0 && count >= limit) {
        break;
      }
    }
    if (batch.length > 0) {
      yield batch;
    }
  } finally {
    rl.close();
    stream.close();
  }
}

/**
 * Counts the non-blank lines that `streamLogBatches` would yield.
 */
export async function countLogLines(filePath: string, limit?: number): Promise<number> {
  const { stream, rl } = openLines(filePath);
  let count = 0;
  try {
    for await (const raw of rl) {
      if (raw.trim().length > 0) {
        count += 1;
      }
    }
  } finally {
    rl.close();
    stream.close();
  }
  return typeof limit === 'number' && limit > 0 ? Math.min(count, limit) : count;
}
