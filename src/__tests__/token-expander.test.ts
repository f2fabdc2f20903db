/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, expect, it } from 'vitest';
import {
  LogRegexp,
  defineSpecialization,
  escapeRegex,
  expandTemplate,
  substituteTokens,
} from '../core/index.js';
import { foo, fooTokens } from './fixtures.js';

describe('escapeRegex', () => {
  it('escapes metacharacters', () => {
    expect(escapeRegex('a.b*(c)')).toBe('a\\.b\\*\\(c\\)');
    expect(escapeRegex('[x]{1}|^$?+\\')).toBe('\\[x\\]\\{1\\}\\|\\^\\$\\?\\+\\\\');
  });

  it('escapes control characters as hex', () => {
    expect(escapeRegex('a\tb')).toBe('a\\x09b');
  });

  it('leaves ordinary punctuation alone', () => {
    expect(escapeRegex('%a - "%b"/')).toBe('%a - "%b"/');
  });
});

describe('expandTemplate', () => {
  it('replaces tokens with their fragments', () => {
    expect(expandTemplate('%a %b', foo)).toBe('(?#a)\\d+(?#!a) (?#b)th(?:is|at)(?#!b)');
  });

  it('keeps unknown tokens as escaped literal text', () => {
    expect(expandTemplate('%z.%a', foo)).toBe('%z\\.(?#a)\\d+(?#!a)');
  });

  it('resolves an alias before substituting tokens', () => {
    expect(expandTemplate(':default', foo)).toBe(
      `${fooTokens['%a']} ${fooTokens['%b']} ${fooTokens['%c']}`,
    );
  });

  it('only treats an exact template as an alias', () => {
    expect(expandTemplate(':default %a', foo)).toBe(':default (?#a)\\d+(?#!a)');
  });

  it('runs the pre-hook on the escaped template', () => {
    expect(expandTemplate('%a    %b', foo)).toBe(expandTemplate('%a %b', foo));
  });

  it('runs hooks in order around token substitution', () => {
    const seen: string[] = [];
    const spec = defineSpecialization({
      name: 'hooks',
      tokens: { '%a': '(?#a)\\d+(?#!a)' },
      preprocess: (template) => {
        seen.push(`pre:${template}`);
        return template;
      },
      postprocess: (template) => {
        seen.push(`post:${template}`);
        return `${template}x`;
      },
    });

    expect(expandTemplate('a.%a', spec)).toBe('a\\.(?#a)\\d+(?#!a)x');
    expect(seen).toEqual(['pre:a\\.%a', 'post:a\\.(?#a)\\d+(?#!a)']);
  });

  it('lets the lexicographically last token win at the same position', () => {
    const spec = defineSpecialization({
      name: 'overlap',
      tokens: {
        '%s': '(?#s)\\d(?#!s)',
        '%sx': '(?#sx)x(?#!sx)',
        '%>s': '(?#status)\\d{3}(?#!status)',
      },
    });

    expect(expandTemplate('%sx', spec)).toBe('(?#sx)x(?#!sx)');
    expect(expandTemplate('%s %>s', spec)).toBe('(?#s)\\d(?#!s) (?#status)\\d{3}(?#!status)');
  });

  it('matches tokens that contain metacharacters', () => {
    const spec = defineSpecialization({
      name: 'braces',
      tokens: { '%{Referer}i': '(?#referer)[^"]*(?#!referer)' },
    });

    expect(expandTemplate('"%{Referer}i"', spec)).toBe('"(?#referer)[^"]*(?#!referer)"');
  });
});

describe('substituteTokens', () => {
  it('never splits an escape pair', () => {
    const order = [{ token: '.', escaped: '.', fragment: 'DOT' }];
    // `\.` is an escaped dot, not a backslash followed by the token
    expect(substituteTokens('\\..', order)).toBe('\\.DOT');
  });

  it('never splits a hex escape', () => {
    const order = [{ token: '9', escaped: '9', fragment: 'NINE' }];
    expect(substituteTokens('a\\x09b9', order)).toBe('a\\x09bNINE');
  });

  it('keeps control characters literal when a token is a hex digit', () => {
    const digits = defineSpecialization({ name: 'digits', tokens: { '9': '(?#n)\\d(?#!n)' } });
    expect(expandTemplate('a\tb9', digits)).toBe('a\\x09b(?#n)\\d(?#!n)');

    const compiled = new LogRegexp(digits, { format: 'a\tb9', capture: ['n'] }).compile();
    expect(compiled.source).toBe('^a\\x09b(\\d)$');
    expect(compiled.exec('a\tb7')?.values).toEqual(['7']);
  });
});
