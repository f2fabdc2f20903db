/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { ConfigurationError } from '../core/errors.js';
import { defineSpecialization, rewriteHook } from '../core/specialization.js';
import type { RewriteRule, Specialization } from '../core/types.js';

/**
 * On-disk shape of a specialization. Hooks are lists of replace rules.
 */
export interface SpecializationFile {
  name: string;
  description?: string;
  tokens: Record<string, string>;
  aliases?: Record<string, string>;
  defaults?: { format?: string; capture?: string[] };
  preprocess?: RewriteRule[];
  postprocess?: RewriteRule[];
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((item: unknown) => typeof item === 'string');

const readStringMap = (
  value: unknown,
  key: string,
  origin: string,
): Record<string, string> | undefined => {
  if (value === undefined) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw new ConfigurationError(`${origin}: "${key}" must be an object of strings.`);
  }
  const result: Record<string, string> = {};
  for (const [entryKey, entryValue] of Object.entries(value)) {
    if (typeof entryValue !== 'string') {
      throw new ConfigurationError(`${origin}: "${key}.${entryKey}" must be a string.`);
    }
    result[entryKey] = entryValue;
  }
  return result;
};

const readRules = (value: unknown, key: string, origin: string): RewriteRule[] | undefined => {
  if (value === undefined) {
    return undefined;
  }
  if (!Array.isArray(value)) {
    throw new ConfigurationError(`${origin}: "${key}" must be a list of rewrite rules.`);
  }
  return value.map((rule: unknown, index) => {
    const pattern = isRecord(rule) ? rule['pattern'] : undefined;
    const replacement = isRecord(rule) ? rule['replacement'] : undefined;
    const flags = isRecord(rule) ? rule['flags'] : undefined;
    if (typeof pattern !== 'string' || typeof replacement !== 'string') {
      throw new ConfigurationError(
        `${origin}: "${key}[${index}]" needs string "pattern" and "replacement".`,
      );
    }
    if (flags !== undefined && typeof flags !== 'string') {
      throw new ConfigurationError(`${origin}: "${key}[${index}].flags" must be a string.`);
    }
    return { pattern, replacement, flags: typeof flags === 'string' ? flags : undefined };
  });
};

/**
 * Checks the shape of parsed JSON.
 *
 * @param origin - File path or label used in error messages
 * @throws ConfigurationError when a field is missing or has the wrong type
 */
export const parseSpecializationFile = (data: unknown, origin: string): SpecializationFile => {
  if (!isRecord(data)) {
    throw new ConfigurationError(`${origin}: specialization must be a JSON object.`);
  }
  const name = data['name'];
  if (typeof name !== 'string' || !name.trim()) {
    throw new ConfigurationError(`${origin}: "name" must be a non-empty string.`);
  }
  const tokens = readStringMap(data['tokens'], 'tokens', origin);
  if (!tokens) {
    throw new ConfigurationError(`${origin}: "tokens" is required.`);
  }

  const rawDefaults = data['defaults'];
  let defaults: SpecializationFile['defaults'];
  if (rawDefaults !== undefined) {
    if (!isRecord(rawDefaults)) {
      throw new ConfigurationError(`${origin}: "defaults" must be an object.`);
    }
    const format = rawDefaults['format'];
    const capture = rawDefaults['capture'];
    if (format !== undefined && typeof format !== 'string') {
      throw new ConfigurationError(`${origin}: "defaults.format" must be a string.`);
    }
    if (capture !== undefined && !isStringArray(capture)) {
      throw new ConfigurationError(`${origin}: "defaults.capture" must be a list of strings.`);
    }
    defaults = {
      format: typeof format === 'string' ? format : undefined,
      capture: isStringArray(capture) ? capture : undefined,
    };
  }

  const description = data['description'];
  return {
    name,
    description: typeof description === 'string' ? description : undefined,
    tokens,
    aliases: readStringMap(data['aliases'], 'aliases', origin),
    defaults,
    preprocess: readRules(data['preprocess'], 'preprocess', origin),
    postprocess: readRules(data['postprocess'], 'postprocess', origin),
  };
};

export const specializationFromFile = (file: SpecializationFile): Specialization =>
  defineSpecialization({
    name: file.name,
    tokens: file.tokens,
    aliases: file.aliases,
    defaults: file.defaults,
    preprocess: file.preprocess ? rewriteHook(file.preprocess) : undefined,
    postprocess: file.postprocess ? rewriteHook(file.postprocess) : undefined,
  });
