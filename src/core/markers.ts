/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Field markers are inline comments in the pattern text: `(?#name)` opens
 * field `name` and `(?#!name)` closes it. They nest like HTML tags.
 */

export type MarkerSegment =
  | { kind: 'text'; value: string }
  | { kind: 'start'; name: string; raw: string }
  | { kind: 'end'; name: string; raw: string };

const MARKER_OPEN = '(?#';
const MARKER = /\(\?#(!?)([-\w]+)\)/y;
const MARKER_GLOBAL = /\(\?#!?([-\w]+)\)/g;

/**
 * Splits pattern text into literal text and field markers.
 * Escaped characters and character classes never start a marker.
 */
export const tokenizeMarkers = (text: string): MarkerSegment[] => {
  const segments: MarkerSegment[] = [];
  let buffer = '';
  let inClass = false;

  const flush = (): void => {
    if (buffer.length > 0) {
      segments.push({ kind: 'text', value: buffer });
      buffer = '';
    }
  };

  let i = 0;
  while (i < text.length) {
    const ch = text[i];
    if (ch === '\\') {
      buffer += text.slice(i, i + 2);
      i += 2;
      continue;
    }
    if (inClass) {
      if (ch === ']') {
        inClass = false;
      }
      buffer += ch;
      i += 1;
      continue;
    }
    if (ch === '[') {
      inClass = true;
      buffer += ch;
      i += 1;
      continue;
    }
    if (text.startsWith(MARKER_OPEN, i)) {
      MARKER.lastIndex = i;
      const match = MARKER.exec(text);
      if (match) {
        flush();
        const [raw, bang, name] = match;
        segments.push({ kind: bang ? 'end' : 'start', name, raw });
        i += raw.length;
        continue;
      }
    }
    buffer += ch;
    i += 1;
  }
  flush();
  return segments;
};

export const stripMarkers = (text: string): string =>
  tokenizeMarkers(text)
    .map((segment) => (segment.kind === 'text' ? segment.value : ''))
    .join('');

/**
 * Names of every start marker in the text, in order of appearance.
 */
export const startMarkerNames = (text: string): string[] =>
  tokenizeMarkers(text).flatMap((segment) => (segment.kind === 'start' ? [segment.name] : []));

/**
 * Highlights markers for terminal output.
 */
export const colorizeMarkers = (text: string): string =>
  text.replace(MARKER_GLOBAL, (marker) => `\x1b[36m${marker}\x1b[0m`);

interface GroupScan {
  capturing: number;
  depth: number;
}

const scanGroups = (text: string): GroupScan => {
  let capturing = 0;
  let depth = 0;
  let inClass = false;
  for (let i = 0; i < text.length; i += 1) {
    const ch = text[i];
    if (ch === '\\') {
      i += 1;
      continue;
    }
    if (inClass) {
      if (ch === ']') inClass = false;
      continue;
    }
    if (ch === '[') {
      inClass = true;
      continue;
    }
    if (ch === '(') {
      depth += 1;
      if (text[i + 1] !== '?') {
        capturing += 1;
      } else if (text[i + 2] === '<' && text[i + 3] !== '=' && text[i + 3] !== '!') {
        // named group
        capturing += 1;
      }
      continue;
    }
    if (ch === ')') {
      depth -= 1;
    }
  }
  return { capturing, depth };
};

/**
 * Number of capturing groups (plain or named) in a marker-free pattern.
 */
export const countCapturingGroups = (text: string): number => scanGroups(text).capturing;

/**
 * Groups opened and not yet closed at the end of a pattern prefix.
 */
export const openGroupDepth = (text: string): number => Math.max(0, scanGroups(text).depth);
