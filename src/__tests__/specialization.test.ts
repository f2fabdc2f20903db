/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { promises as fs } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  ConfigurationError,
  LogRegexp,
  defineSpecialization,
  extendSpecialization,
  rewriteHook,
} from '../core/index.js';
import {
  FileSpecializationStore,
  listAvailableSpecializations,
  parseSpecializationFile,
  resolveSpecialization,
} from '../specializations/index.js';
import { foo, fooTokens } from './fixtures.js';

describe('defineSpecialization', () => {
  it('orders tokens lexicographically last first', () => {
    expect(foo.tokenOrder.map((entry) => entry.token)).toEqual(['%d', '%c', '%b', '%a']);
  });

  it('rejects an empty name', () => {
    expect(() => defineSpecialization({ name: ' ', tokens: {} })).toThrow(
      'Specialization name must not be empty.',
    );
  });

  it('rejects an empty token key', () => {
    expect(() => defineSpecialization({ name: 'x', tokens: { '': '(?#a)a(?#!a)' } })).toThrow(
      'Specialization "x": empty token key.',
    );
  });

  it('names the specialization and token of a malformed fragment', () => {
    expect(() => defineSpecialization({ name: 'x', tokens: { '%z': '(?#z)a' } })).toThrow(
      new ConfigurationError('Specialization "x": Token "%z": field "z" is never closed.'),
    );
  });
});

describe('extendSpecialization', () => {
  it('merges tokens over the base without touching it', () => {
    const extended = extendSpecialization(foo, { name: 'foo2', tokens: { '%e': '(?#e)e+(?#!e)' } });
    expect(extended.fields.has('e')).toBe(true);
    expect(foo.fields.has('e')).toBe(false);
    expect(extended.tokens.get('%a')).toBe(fooTokens['%a']);
    expect(extended.defaults.format).toBe('%d %c %b');
  });
});

describe('rewriteHook', () => {
  it('applies rules in order', () => {
    const hook = rewriteHook([
      { pattern: 'a', replacement: 'b' },
      { pattern: 'b', flags: '', replacement: 'c' },
    ]);
    expect(hook('ab')).toBe('cb');
  });

  it('reports a rule that does not compile', () => {
    expect(() => rewriteHook([{ pattern: '(', replacement: '' }])).toThrow(/^Invalid rewrite rule \/\(\/: /);
  });
});

describe('parseSpecializationFile', () => {
  it('requires an object with a name and tokens', () => {
    expect(() => parseSpecializationFile([], 'x.json')).toThrow(
      'x.json: specialization must be a JSON object.',
    );
    expect(() => parseSpecializationFile({ tokens: {} }, 'x.json')).toThrow(
      'x.json: "name" must be a non-empty string.',
    );
    expect(() => parseSpecializationFile({ name: 'x' }, 'x.json')).toThrow(
      'x.json: "tokens" is required.',
    );
  });

  it('checks value types', () => {
    expect(() => parseSpecializationFile({ name: 'x', tokens: { '%a': 1 } }, 'x.json')).toThrow(
      'x.json: "tokens.%a" must be a string.',
    );
    expect(() =>
      parseSpecializationFile({ name: 'x', tokens: {}, defaults: { capture: 'a' } }, 'x.json'),
    ).toThrow('x.json: "defaults.capture" must be a list of strings.');
    expect(() =>
      parseSpecializationFile({ name: 'x', tokens: {}, preprocess: [{ pattern: 'a' }] }, 'x.json'),
    ).toThrow('x.json: "preprocess[0]" needs string "pattern" and "replacement".');
  });
});

describe('FileSpecializationStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(join(tmpdir(), 'log-regexp-spec-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  const writeSpec = async (name: string, data: unknown): Promise<void> => {
    await fs.writeFile(join(dir, `${name}.json`), JSON.stringify(data), 'utf8');
  };

  it('lists and loads specializations from its directory', async () => {
    await writeSpec('digits', {
      name: 'digits',
      tokens: { '%n': '(?#n)\\d+(?#!n)' },
      defaults: { format: '%n-%n', capture: ['n'] },
    });
    await fs.writeFile(join(dir, 'notes.txt'), 'ignored', 'utf8');
    const store = new FileSpecializationStore({ baseDir: dir });

    expect(await store.listSpecializations()).toEqual(['digits']);
    expect(await store.has('digits')).toBe(true);
    const digits = await store.loadSpecialization('digits');
    expect(await store.loadSpecialization('digits')).toBe(digits);
    expect(new LogRegexp(digits).compile().exec('4-20')?.values).toEqual(['4', '20']);
  });

  it('lists nothing for a missing directory', async () => {
    const store = new FileSpecializationStore({ baseDir: join(dir, 'missing') });
    expect(await store.listSpecializations()).toEqual([]);
  });

  it('prefers user directories over bundled specializations', async () => {
    await writeSpec('foo', { name: 'foo-local', tokens: { '%a': '(?#a)a(?#!a)' } });
    expect((await resolveSpecialization('foo', { directories: [dir] })).name).toBe('foo-local');
    expect((await resolveSpecialization('foo')).name).toBe('foo');
  });

  it('loads a specialization by file path', async () => {
    await writeSpec('path', { name: 'by-path', tokens: {} });
    expect((await resolveSpecialization(join(dir, 'path.json'))).name).toBe('by-path');
  });

  it('reports unknown names and invalid JSON', async () => {
    await expect(resolveSpecialization('nothing-here', { directories: [dir] })).rejects.toThrow(
      'Unknown specialization "nothing-here".',
    );
    await fs.writeFile(join(dir, 'broken.json'), '{', 'utf8');
    await expect(resolveSpecialization(join(dir, 'broken.json'))).rejects.toThrow(
      /broken\.json: invalid JSON: /,
    );
  });

  it('merges user and bundled names', async () => {
    await writeSpec('digits', { name: 'digits', tokens: {} });
    expect(await listAvailableSpecializations([dir])).toEqual(['common', 'digits', 'foo']);
  });
});

describe('bundled foo specialization', () => {
  it('compiles like the in-code definition', async () => {
    const bundled = new LogRegexp(await resolveSpecialization('foo')).compile();
    expect(bundled.source).toBe(new LogRegexp(foo).compile().source);
    expect(bundled.fields).toEqual(['c']);
  });
});
