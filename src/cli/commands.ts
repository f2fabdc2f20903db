/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { LogRegexp } from '../core/log-regexp.js';
import { logConsole } from '../core/logging.js';
import { colorizeMarkers } from '../core/markers.js';
import type { Specialization } from '../core/types.js';
import type { RunnerOptions } from './args.js';

export const createCompiler = (specialization: Specialization, options: RunnerOptions): LogRegexp =>
  new LogRegexp(specialization, {
    format: options.format,
    capture: options.capture,
    comments: options.comments,
  });

/**
 * Prints the compiled pattern and the order of its captured fields.
 */
export const runCompileCommand = (specialization: Specialization, options: RunnerOptions): void => {
  const log = createCompiler(specialization, options);
  const compiled = log.compile();
  const ignored = [...log.requestedFields()].filter((name) => !compiled.fields.includes(name));
  logConsole('info', 'compiled', [
    ['specialization', specialization.name],
    ['format', log.getFormat()],
    ['pattern', options.comments ? colorizeMarkers(compiled.source) : compiled.source],
    ['fields', compiled.fields.join(', ')],
  ]);
  if (ignored.length > 0) {
    logConsole('warn', 'not in template', [['fields', ignored.join(', ')]]);
  }
};

/**
 * Prints every field the specialization knows and those the template uses.
 */
export const runFieldsCommand = (specialization: Specialization, options: RunnerOptions): void => {
  const log = createCompiler(specialization, options);
  logConsole('info', 'fields', [
    ['specialization', specialization.name],
    ['format', log.getFormat()],
    ['all', [...log.allFields()].sort().join(', ')],
    ['template', log.templateFields().join(', ')],
    ['aliases', [...specialization.aliases.keys()].join(', ')],
  ]);
};
