/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { ConfigurationError, describeError } from './errors.js';
import {
  countCapturingGroups,
  startMarkerNames,
  stripMarkers,
  tokenizeMarkers,
  type MarkerSegment,
} from './markers.js';

/**
 * Union of the field names produced by every fragment of a token table.
 */
export const allFieldNames = (fragments: Iterable<string>): Set<string> => {
  const names = new Set<string>();
  for (const fragment of fragments) {
    for (const name of startMarkerNames(fragment)) {
      names.add(name);
    }
  }
  return names;
};

/**
 * Fields present in a tagged template, in start-marker order.
 * A field used twice is listed twice: each occurrence is its own group.
 */
export const templateFields = (tagged: string): string[] => startMarkerNames(tagged);

export interface FieldSpan {
  name: string;
  /** Index of the start marker segment. */
  start: number;
  /** Index of the end marker segment. */
  end: number;
}

/**
 * Pairs start and end markers with a stack. An end marker must close the
 * innermost open field of the same name.
 *
 * @param label - Used in error messages to locate the problem
 * @throws ConfigurationError on unbalanced or interleaved markers
 */
export const pairMarkers = (segments: readonly MarkerSegment[], label: string): FieldSpan[] => {
  const spans: FieldSpan[] = [];
  const stack: Array<{ name: string; index: number }> = [];

  segments.forEach((segment, index) => {
    if (segment.kind === 'start') {
      stack.push({ name: segment.name, index });
      return;
    }
    if (segment.kind !== 'end') {
      return;
    }
    const open = stack.pop();
    if (!open) {
      throw new ConfigurationError(
        `${label}: end marker "${segment.raw}" has no matching start marker.`,
      );
    }
    if (open.name !== segment.name) {
      throw new ConfigurationError(
        `${label}: end marker "${segment.raw}" found while field "${open.name}" is still open.`,
      );
    }
    spans.push({ name: open.name, start: open.index, end: index });
  });

  const unclosed = stack.pop();
  if (unclosed) {
    throw new ConfigurationError(`${label}: field "${unclosed.name}" is never closed.`);
  }
  return spans.sort((a, b) => a.start - b.start);
};

/**
 * Checks a token fragment when its specialization is registered.
 *
 * @throws ConfigurationError if markers are unbalanced, if the fragment has
 *   its own capturing group (field numbering would shift), or if the
 *   fragment is not a valid pattern
 */
export const validateFragment = (token: string, fragment: string): void => {
  const label = `Token "${token}"`;
  pairMarkers(tokenizeMarkers(fragment), label);

  const bare = stripMarkers(fragment);
  if (countCapturingGroups(bare) > 0) {
    throw new ConfigurationError(
      `${label}: fragment contains a capturing group; use (?:...) so field numbering stays aligned.`,
    );
  }
  try {
    // eslint-disable-next-line no-new
    new RegExp(bare);
  } catch (error) {
    throw new ConfigurationError(`${label}: invalid pattern fragment: ${describeError(error)}`, {
      cause: error,
    });
  }
};
