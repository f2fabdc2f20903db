/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { resolve } from 'node:path';

export interface CompilerEnvConfig {
  specialization: string;
  specializationDir?: string;
  trace: boolean;
  comments: boolean;
  outputDir: string;
}

const DEFAULT_SPECIALIZATION = 'common';

const readFlag = (value: string | undefined): boolean =>
  value !== undefined && ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());

/**
 * Defaults for the command line, taken from the environment.
 * Command-line flags override every value.
 */
export const resolveCompilerConfigFromEnv = (
  env: NodeJS.ProcessEnv = process.env,
): CompilerEnvConfig => ({
  specialization: env['LOG_REGEXP_SPEC']?.trim() || DEFAULT_SPECIALIZATION,
  specializationDir: env['LOG_REGEXP_SPEC_DIR']?.trim() || undefined,
  trace: readFlag(env['LOG_REGEXP_TRACE']),
  comments: readFlag(env['LOG_REGEXP_COMMENTS']),
  outputDir: resolve(env['LOG_REGEXP_OUTPUT_DIR']?.trim() || 'artifacts/log-regexp'),
});
