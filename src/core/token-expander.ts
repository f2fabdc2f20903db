/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Expands a raw log-format template into a tagged template: literal text is
 * escaped and every token is replaced with its marker-annotated fragment.
 */

import type { Specialization, TokenEntry } from './types.js';

const REGEX_SPECIAL = /[\\^$.*+?()[\]{}|]/g;

/**
 * Escapes special regex characters in text.
 * Also escapes control characters as hex sequences.
 *
 * @param text - Text to escape
 * @returns Escaped text safe for use in regex
 */
export const escapeRegex = (text: string): string => {
  let escaped = text.replace(REGEX_SPECIAL, '\\$&');
  escaped = escaped.replace(/[\u0000-\u001f\u007f-\u009f]/g, (ch) => {
    const hex = ch.charCodeAt(0).toString(16).padStart(2, '0');
    return `\\x${hex}`;
  });
  return escaped;
};

/**
 * Resolves a template alias. Only an exact match of the whole raw template
 * is an alias; anything else is returned unchanged.
 */
export const resolveAlias = (raw: string, specialization: Specialization): string =>
  specialization.aliases.get(raw) ?? raw;

/**
 * Length of the escape unit at `index`: `\xHH` is four characters, any other
 * `\c` pair two, and a plain character one.
 */
const escapeUnitLength = (text: string, index: number): number => {
  if (text[index] !== '\\') {
    return 1;
  }
  return text[index + 1] === 'x' ? 4 : 2;
};

/**
 * Replaces every token occurrence in an escaped template with its fragment.
 *
 * Scans left to right. At each position the tokens are tried in
 * `tokenOrder`, so when two keys both match the lexicographically last one
 * wins. Matching only starts on escape-unit boundaries: neither a `\c` pair
 * nor a `\xHH` escape is ever split between literal text and a token.
 */
export const substituteTokens = (escaped: string, tokenOrder: readonly TokenEntry[]): string => {
  const parts: string[] = [];
  let cursor = 0;
  while (cursor < escaped.length) {
    const entry = tokenOrder.find(
      (candidate) => candidate.escaped.length > 0 && escaped.startsWith(candidate.escaped, cursor),
    );
    if (entry) {
      parts.push(entry.fragment);
      cursor += entry.escaped.length;
      continue;
    }
    const unit = escapeUnitLength(escaped, cursor);
    parts.push(escaped.slice(cursor, cursor + unit));
    cursor += unit;
  }
  return parts.join('');
};

/**
 * Produces the tagged template for a raw format string.
 *
 * Order: alias resolution, escaping, pre-hook, token substitution, post-hook.
 */
export const expandTemplate = (raw: string, specialization: Specialization): string => {
  const resolved = resolveAlias(raw, specialization);
  const escaped = specialization.preprocess(escapeRegex(resolved));
  const substituted = substituteTokens(escaped, specialization.tokenOrder);
  return specialization.postprocess(substituted);
};
