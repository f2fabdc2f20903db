/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { promises as fs } from 'node:fs';
import { dirname } from 'node:path';
import { ensureDirectory } from '../files.js';

export interface MatchedLine {
  lineIndex: number;
  raw: string;
  values: ReadonlyArray<string | undefined>;
}

export interface MatchReportOptions {
  filePath: string;
  /** Column names for the captured values, in capture order. */
  fields: readonly string[];
  delimiter?: string;
  append?: boolean;
  includeHeader?: boolean;
}

/**
 * Writes matched lines as CSV: line index, raw line, then one column per
 * captured field.
 */
export const writeMatchReport = async (
  records: MatchedLine[],
  options: MatchReportOptions,
): Promise<void> => {
  const delimiter = options.delimiter ?? ',';
  const header = ['line_index', 'raw_log', ...options.fields];
  const rows = records.map((record) => [
    String(record.lineIndex),
    record.raw,
    ...options.fields.map((_, index) => record.values[index] ?? ''),
  ]);
  const formatRow = (columns: string[]): string =>
    columns.map((value) => formatCsvValue(value, delimiter)).join(delimiter);
  const includeHeader = options.includeHeader ?? !options.append;
  const outputLines = includeHeader ? [formatRow(header), ...rows.map(formatRow)] : rows.map(formatRow);
  await ensureDirectory(dirname(options.filePath));
  if (outputLines.length === 0) {
    if (!options.append) {
      await fs.writeFile(options.filePath, '', 'utf8');
    }
    return;
  }
  const serialized = `${outputLines.join('\n')}\n`;
  if (options.append) {
    await fs.appendFile(options.filePath, serialized, 'utf8');
  } else {
    await fs.writeFile(options.filePath, serialized, 'utf8');
  }
};

export const formatCsvValue = (value: string, delimiter: string): string => {
  const needsQuoting =
    value.includes(delimiter) || value.includes('\n') || value.includes('"') || value.includes("'");
  if (!needsQuoting) {
    return value;
  }
  const escaped = value.replace(/"/g, '""');
  return `"${escaped}"`;
};
