/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export class LogRegexpError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Raised for specialization authoring mistakes: unbalanced or misnamed
 * field markers, fragments that break group numbering, malformed files.
 */
export class ConfigurationError extends LogRegexpError {}

/**
 * Raised when the assembled pattern is rejected by the RegExp engine.
 */
export class PatternCompileError extends LogRegexpError {
  readonly source: string;
  readonly location: string;

  constructor(
    message: string,
    details: { source: string; location: string; cause?: unknown },
  ) {
    super(message, { cause: details.cause });
    this.source = details.source;
    this.location = details.location;
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
