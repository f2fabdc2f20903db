/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { TraceSink } from './types.js';

/**
 * Unified console logger with structured, multiline output.
 * Each non-empty field is printed on its own line for readability.
 */
export const logConsole = (
  level: 'info' | 'warn' | 'error',
  label: string,
  fields: Array<[string, string | number | undefined | null]>,
): void => {
  const filtered = fields.filter(
    (entry): entry is [string, string | number] =>
      entry[1] !== undefined && entry[1] !== null && entry[1] !== '',
  );
  const width = filtered.reduce((max, [key]) => Math.max(max, key.length), 0);
  const lines: string[] = [`[log-regexp] ${label}:`];
  for (const [key, value] of filtered) {
    lines.push(`  ${key.padEnd(width)} = ${value}`);
  }
  const output = lines.join('\n');
  if (level === 'warn') {
    console.warn(output);
  } else if (level === 'error') {
    console.error(output);
  } else {
    console.log(output);
  }
};

/**
 * Trace sink that keeps everything written to it, for reports and tests.
 */
export class BufferedTraceSink implements TraceSink {
  private chunks: string[] = [];

  write(chunk: string): void {
    this.chunks.push(chunk);
  }

  /** Returns the buffered text and empties the buffer. */
  drain(): string {
    const text = this.chunks.join('');
    this.chunks = [];
    return text;
  }
}
