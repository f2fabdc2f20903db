/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * A specialization describes one log format: its token table, template
 * aliases, defaults and hooks. It is validated once, frozen, and shared by
 * every compiler built for that format.
 */

import { ConfigurationError, describeError } from './errors.js';
import { allFieldNames, validateFragment } from './field-registry.js';
import { escapeRegex } from './token-expander.js';
import type {
  CaptureItem,
  RewriteRule,
  Specialization,
  SpecializationDefinition,
  TemplateHook,
  TokenEntry,
} from './types.js';

const identity: TemplateHook = (template) => template;

const freezeMap = <V>(record: Readonly<Record<string, V>> | undefined): ReadonlyMap<string, V> =>
  new Map(Object.entries(record ?? {}));

/**
 * Validates a definition and builds the shared specialization value.
 *
 * @throws ConfigurationError if a token is empty or a fragment is malformed
 */
export const defineSpecialization = (definition: SpecializationDefinition): Specialization => {
  if (!definition.name.trim()) {
    throw new ConfigurationError('Specialization name must not be empty.');
  }
  const tokens = freezeMap(definition.tokens);
  for (const [token, fragment] of tokens) {
    if (token.length === 0) {
      throw new ConfigurationError(`Specialization "${definition.name}": empty token key.`);
    }
    try {
      validateFragment(token, fragment);
    } catch (error) {
      throw new ConfigurationError(
        `Specialization "${definition.name}": ${describeError(error)}`,
        { cause: error },
      );
    }
  }

  const tokenOrder: TokenEntry[] = [...tokens.keys()]
    .sort()
    .reverse()
    .map((token) =>
      Object.freeze({ token, escaped: escapeRegex(token), fragment: tokens.get(token) ?? '' }),
    );

  const capture: readonly CaptureItem[] = Object.freeze([...(definition.defaults?.capture ?? [])]);

  return Object.freeze({
    name: definition.name,
    tokens,
    aliases: freezeMap(definition.aliases),
    defaults: Object.freeze({ format: definition.defaults?.format ?? '', capture }),
    preprocess: definition.preprocess ?? identity,
    postprocess: definition.postprocess ?? identity,
    tokenOrder: Object.freeze(tokenOrder),
    fields: allFieldNames(tokens.values()),
  });
};

export interface SpecializationOverrides {
  name?: string;
  tokens?: Readonly<Record<string, string>>;
  aliases?: Readonly<Record<string, string>>;
  defaults?: SpecializationDefinition['defaults'];
  preprocess?: TemplateHook;
  postprocess?: TemplateHook;
}

/**
 * Derives a new specialization with tokens and aliases merged over the base.
 * The base is left untouched.
 */
export const extendSpecialization = (
  base: Specialization,
  overrides: SpecializationOverrides,
): Specialization =>
  defineSpecialization({
    name: overrides.name ?? base.name,
    tokens: { ...Object.fromEntries(base.tokens), ...overrides.tokens },
    aliases: { ...Object.fromEntries(base.aliases), ...overrides.aliases },
    defaults: { ...base.defaults, ...overrides.defaults },
    preprocess: overrides.preprocess ?? base.preprocess,
    postprocess: overrides.postprocess ?? base.postprocess,
  });

/**
 * Builds a hook from declarative replace rules, applied in order.
 *
 * @throws ConfigurationError if a rule pattern does not compile
 */
export const rewriteHook = (rules: readonly RewriteRule[]): TemplateHook => {
  if (rules.length === 0) {
    return identity;
  }
  const compiled = rules.map((rule) => {
    try {
      return { regex: new RegExp(rule.pattern, rule.flags ?? 'g'), replacement: rule.replacement };
    } catch (error) {
      throw new ConfigurationError(`Invalid rewrite rule /${rule.pattern}/: ${describeError(error)}`, {
        cause: error,
      });
    }
  });
  return (template) =>
    compiled.reduce((current, rule) => current.replace(rule.regex, rule.replacement), template);
};
