/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { defineSpecialization, rewriteHook } from '../core/index.js';

export const fooTokens = {
  '%a': '(?#a)\\d+(?#!a)',
  '%b': '(?#b)th(?:is|at)(?#!b)',
  '%c': '(?#c)(?#cs)\\w+(?#!cs)/(?#cn)\\d+(?#!cn)(?#!c)',
  '%d': '(?#d)(?:foo|bar|baz)(?#!d)',
};

export const foo = defineSpecialization({
  name: 'foo',
  tokens: fooTokens,
  aliases: { ':default': '%a %b %c' },
  defaults: { format: '%d %c %b', capture: ['c'] },
  preprocess: rewriteHook([{ pattern: ' +', replacement: ' ' }]),
});
