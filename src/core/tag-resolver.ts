/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { pairMarkers } from './field-registry.js';
import { tokenizeMarkers } from './markers.js';

export interface ResolvedTemplate {
  /** Pattern text with every field wrapped in a group; markers are kept. */
  marked: string;
  /** Names of the fields given a capturing group, in group order. */
  captured: string[];
}

/**
 * Turns every marked field into a group: capturing when the field is in
 * `capture`, non-capturing otherwise.
 *
 * Group openers are emitted in start-marker order, so the Nth field of the
 * template is the Nth group whatever its depth. Each nesting level gets its
 * own decision: a captured child inside a non-captured parent stays a
 * capturing group.
 *
 * @throws ConfigurationError if the markers do not pair up
 */
export const resolveTags = (tagged: string, capture: ReadonlySet<string>): ResolvedTemplate => {
  const segments = tokenizeMarkers(tagged);
  pairMarkers(segments, 'Tagged template');

  const parts: string[] = [];
  const captured: string[] = [];
  for (const segment of segments) {
    switch (segment.kind) {
      case 'text':
        parts.push(segment.value);
        break;
      case 'start':
        if (capture.has(segment.name)) {
          captured.push(segment.name);
          parts.push('(', segment.raw);
        } else {
          parts.push('(?:', segment.raw);
        }
        break;
      case 'end':
        parts.push(segment.raw, ')');
        break;
    }
  }
  return { marked: parts.join(''), captured };
};
