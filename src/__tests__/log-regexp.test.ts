/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, expect, it } from 'vitest';
import {
  BufferedTraceSink,
  ConfigurationError,
  LogRegexp,
  PatternCompileError,
  SELECT_NONE,
  defineSpecialization,
  extendSpecialization,
} from '../core/index.js';
import { resolveSpecialization } from '../specializations/index.js';
import { foo } from './fixtures.js';

describe('LogRegexp defaults', () => {
  it('takes format and capture from the specialization', () => {
    const log = new LogRegexp(foo);
    expect(log.getFormat()).toBe('%d %c %b');
    expect(log.getCapture()).toEqual(['c']);
    expect(log.getComments()).toBe(false);
    expect(log.getTrace()).toBe(false);
  });

  it('compiles an anchored pattern capturing only the requested field', () => {
    const compiled = new LogRegexp(foo).compile();
    expect(compiled.source).toBe('^(?:(?:foo|bar|baz)) ((?:\\w+)/(?:\\d+)) (?:th(?:is|at))$');
    expect(compiled.fields).toEqual(['c']);
    expect(compiled.exec('foo that/42 this')).toEqual({
      values: ['that/42'],
      fields: { c: 'that/42' },
    });
  });

  it('does not match partial lines', () => {
    const { regexp } = new LogRegexp(foo).compile();
    expect(regexp.test('foo that/42 this!')).toBe(false);
    expect(regexp.test('xfoo that/42 this')).toBe(false);
  });
});

describe('LogRegexp format', () => {
  it('returns the previous format from setFormat', () => {
    const log = new LogRegexp(foo);
    expect(log.setFormat('%a')).toBe('%d %c %b');
    expect(log.getFormat()).toBe('%a');
  });

  it('keeps the alias name as the stored format', () => {
    const log = new LogRegexp(foo, { format: ':default', capture: [':all'] });
    expect(log.getFormat()).toBe(':default');
    expect(log.templateFields()).toEqual(['a', 'b', 'c', 'cs', 'cn']);
    expect(log.compile().exec('12 this x/3')?.values).toEqual(['12', 'this', 'x/3', 'x', '3']);
  });

  it('recompiles after a format change', () => {
    const log = new LogRegexp(foo, { capture: ['a'] });
    log.setFormat('%a');
    expect(log.compile().exec('7')?.fields).toEqual({ a: '7' });
  });
});

describe('LogRegexp capture', () => {
  it('reports captured fields in template order', () => {
    const log = new LogRegexp(foo);
    expect(log.setCapture('cn', 'd')).toEqual(['d', 'c', 'cn']);
    expect(log.compile().exec('bar a/1 this')?.values).toEqual(['bar', 'a/1', '1']);
  });

  it('resets with :none', () => {
    const log = new LogRegexp(foo);
    expect(log.setCapture(':none', 'b')).toEqual(['b']);
    expect(log.setCapture(SELECT_NONE)).toEqual([]);
    expect(log.compile().fields).toEqual([]);
  });

  it('keeps unknown names requested but never captures them', () => {
    const log = new LogRegexp(foo, { capture: ['nope'] });
    expect(log.getCapture()).toEqual([]);
    expect(log.requestedFields()).toEqual(new Set(['nope']));
  });

  it('captures every occurrence of a repeated field, the last value winning by name', () => {
    const log = new LogRegexp(foo, { format: '%a-%a', capture: ['a'] });
    expect(log.compile().exec('1-2')).toEqual({ values: ['1', '2'], fields: { a: '2' } });
  });
});

describe('LogRegexp allFields', () => {
  it('lists every field the tokens can produce', () => {
    expect([...new LogRegexp(foo).allFields()].sort()).toEqual(['a', 'b', 'c', 'cn', 'cs', 'd']);
  });
});

describe('LogRegexp compile', () => {
  it('yields the same pattern and capture order when compiled twice', () => {
    const log = new LogRegexp(foo, { capture: [':none', 'cn', 'd'] });
    const first = log.compile();
    const second = log.compile();
    expect(first.source).toBe('^((?:foo|bar|baz)) (?:(?:\\w+)/(\\d+)) (?:th(?:is|at))$');
    expect(first.fields).toEqual(['d', 'cn']);
    expect(second.source).toBe(first.source);
    expect(second.fields).toEqual(first.fields);

    log.setComments(true);
    log.setComments(false);
    const third = log.compile();
    expect(third.source).toBe(first.source);
    expect(third.fields).toEqual(first.fields);
  });

  it('exposes the compiled regexp directly', () => {
    const log = new LogRegexp(foo);
    const regexp = log.regexp();
    expect(regexp.source).toBe(log.compile().regexp.source);
    expect(regexp.exec('baz x/1 that')?.[1]).toBe('x/1');
  });
});

describe('LogRegexp comments', () => {
  it('keeps markers in the source but not in the regexp', () => {
    const log = new LogRegexp(foo, { format: '%a', capture: ['a'] });
    expect(log.setComments(true)).toBe(false);
    const compiled = log.compile();
    expect(compiled.source).toBe('^((?#a)\\d+(?#!a))$');
    expect(compiled.exec('42')?.values).toEqual(['42']);
  });
});

describe('LogRegexp trace', () => {
  const traced = (format: string, capture: string[], line: string): string => {
    const sink = new BufferedTraceSink();
    const log = new LogRegexp(foo, { format, capture });
    expect(log.setTrace(true, sink)).toBe(false);
    log.compile().exec(line);
    return sink.drain();
  };

  it('reports every field of a successful match', () => {
    expect(traced('%a %b', ['a', 'b'], '12 this')).toBe('\na b ');
  });

  it('reports the fields reached before a failure', () => {
    expect(traced('%a %b', ['a', 'b'], '12 those')).toBe('\na ');
    expect(traced('%a %b', ['a', 'b'], 'x this')).toBe('\n');
  });

  it('reports nested fields innermost first, including non-captured ones', () => {
    expect(traced('%c', [], 'x/1')).toBe('\ncs cn c ');
    expect(traced('%c', [], 'x/')).toBe('\ncs ');
  });

  it('does not change group numbering', () => {
    const sink = new BufferedTraceSink();
    const log = new LogRegexp(foo, { format: '%a %b', capture: ['b'], trace: true, traceSink: sink });
    expect(log.compile().exec('5 that')?.values).toEqual(['that']);
  });

  it('keeps fragments that use \\k compiling', () => {
    const spec = defineSpecialization({ name: 'letter-k', tokens: { '%k': '(?#k)\\k(?#!k)' } });
    const sink = new BufferedTraceSink();
    const log = new LogRegexp(spec, { format: '%k', capture: ['k'], trace: true, traceSink: sink });
    expect(log.compile().exec('k')?.values).toEqual(['k']);
    expect(sink.drain()).toBe('\nk ');
  });
});

describe('LogRegexp errors', () => {
  it('rejects hooks that leave markers unbalanced', () => {
    const broken = extendSpecialization(foo, { postprocess: (t) => `${t}(?#!zz)` });
    const log = new LogRegexp(broken, { format: '%a' });
    expect(() => log.compile()).toThrow(
      new ConfigurationError('Tagged template: end marker "(?#!zz)" has no matching start marker.'),
    );
  });

  it('locates a rejected pattern in the offending field', () => {
    const spec = defineSpecialization({
      name: 'quantified',
      tokens: { '%q': '(?#q)a(?#!q)' },
      postprocess: (t) => t.replace('a(?#!q)', 'a{2,1}(?#!q)'),
    });
    const log = new LogRegexp(spec, { format: '%q', capture: ['q'] });
    let caught: unknown;
    try {
      log.compile();
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(PatternCompileError);
    if (caught instanceof PatternCompileError) {
      expect(caught.location).toBe('field "q"');
      expect(caught.source).toBe('^(a{2,1})$');
      expect(caught.message).toMatch(/^Pattern rejected in field "q": /);
    }
  });

  it('falls back to the template when no field is at fault', () => {
    const spec = defineSpecialization({
      name: 'quantified',
      tokens: { '%q': '(?#q)a(?#!q)' },
      postprocess: (t) => `${t}{2,1}`,
    });
    expect(() => new LogRegexp(spec, { format: '%q' }).compile()).toThrow(
      /^Pattern rejected in template: /,
    );
  });
});

describe('common specialization', () => {
  it('parses a combined access log line', async () => {
    const common = await resolveSpecialization('common');
    const log = new LogRegexp(common, {
      format: ':combined',
      capture: [':none', 'host', 'status', 'req_file', 'useragent'],
    });
    const compiled = log.compile();
    expect(compiled.fields).toEqual(['host', 'req_file', 'status', 'useragent']);
    const match = compiled.exec(
      '10.0.0.5 - alice [03/Mar/2024:08:15:02 +0100] "POST /api/items HTTP/1.1" 201 512 "-" "test-agent/1.0"',
    );
    expect(match?.values).toEqual(['10.0.0.5', '/api/items', '201', 'test-agent/1.0']);
  });

  it('accepts a dash for missing bytes in the common format', async () => {
    const log = new LogRegexp(await resolveSpecialization('common'), { capture: [':none', 'bytes'] });
    expect(log.compile().exec('host - - [01/Jan/2024:00:00:00 -0500] "GET / HTTP/1.0" 304 -')?.values).toEqual([
      '-',
    ]);
  });
});
