/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { CaptureInstruction, CaptureItem } from './types.js';

export const SELECT_NONE: CaptureInstruction = { kind: 'none' };
export const SELECT_ALL: CaptureInstruction = { kind: 'all' };

export const selectField = (name: string): CaptureInstruction => ({ kind: 'field', name });

/**
 * Accepts the `:none` / `:all` spellings alongside plain field names.
 */
export const toCaptureInstruction = (item: CaptureItem): CaptureInstruction => {
  if (typeof item !== 'string') {
    return item;
  }
  if (item === ':none') return SELECT_NONE;
  if (item === ':all') return SELECT_ALL;
  return selectField(item);
};

/**
 * Applies capture items left to right and returns the resulting set.
 * `none` empties the set, `all` replaces it with the field universe.
 */
export const applyCaptureInstructions = (
  items: readonly CaptureItem[],
  current: ReadonlySet<string>,
  universe: Iterable<string>,
): Set<string> => {
  let next = new Set(current);
  for (const instruction of items.map(toCaptureInstruction)) {
    switch (instruction.kind) {
      case 'none':
        next = new Set();
        break;
      case 'all':
        next = new Set(universe);
        break;
      case 'field':
        next.add(instruction.name);
        break;
    }
  }
  return next;
};

/**
 * Splits a comma-separated capture list (`host,:none,status`).
 */
export const parseCaptureList = (value: string): string[] =>
  value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
