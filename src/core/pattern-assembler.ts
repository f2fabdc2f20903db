/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { PatternCompileError, describeError } from './errors.js';
import { pairMarkers } from './field-registry.js';
import {
  countCapturingGroups,
  openGroupDepth,
  stripMarkers,
  tokenizeMarkers,
  type MarkerSegment,
} from './markers.js';
import type { ResolvedTemplate } from './tag-resolver.js';
import type { CompiledPattern, FieldMatch, TraceSink } from './types.js';

export interface AssembleOptions {
  /** Keep the field markers in `source`. */
  keepMarkers?: boolean;
  /** Report reached field boundaries on every `exec`. */
  trace?: boolean;
  /** Where trace output goes. Defaults to stderr. */
  traceSink?: TraceSink;
}

const TRACE_SEPARATOR = ' ';

interface Probe {
  field: string;
  /** Group number of the probe in the traced pattern. */
  group: number;
}

/**
 * Reports which field boundaries a match attempt reached.
 *
 * Works on a copy of the pattern with an empty group after every end
 * marker. Probe groups are unnamed so that `\k` keeps its meaning in
 * fragments. A successful attempt reports every probe that took part in
 * the match; a failed one reports the probes of the longest pattern prefix
 * (cut right after an end marker) that still matches the line.
 */
class FieldTracer {
  private readonly probes: Probe[] = [];
  private readonly prefixSources: string[] = [];
  private readonly prefixCache = new Map<number, RegExp>();
  private readonly full: RegExp;

  constructor(segments: readonly MarkerSegment[]) {
    let body = '';
    for (const segment of segments) {
      if (segment.kind === 'text') {
        body += segment.value;
      } else if (segment.kind === 'end') {
        this.probes.push({ field: segment.name, group: countCapturingGroups(body) + 1 });
        body += '()';
        this.prefixSources.push(body);
      }
    }
    this.full = new RegExp(`^${body}$`);
  }

  trace(line: string, sink: TraceSink): void {
    sink.write('\n');
    const match = this.full.exec(line);
    if (match) {
      this.report(match, this.probes.length - 1, sink);
      return;
    }
    for (let index = this.probes.length - 1; index >= 0; index -= 1) {
      const partial = this.prefix(index).exec(line);
      if (partial) {
        this.report(partial, index, sink);
        return;
      }
    }
  }

  private report(match: RegExpExecArray, last: number, sink: TraceSink): void {
    for (const probe of this.probes.slice(0, last + 1)) {
      if (match[probe.group] !== undefined) {
        sink.write(`${probe.field}${TRACE_SEPARATOR}`);
      }
    }
  }

  private prefix(index: number): RegExp {
    const cached = this.prefixCache.get(index);
    if (cached) {
      return cached;
    }
    const source = this.prefixSources[index];
    const regex = new RegExp(`^${source}${')'.repeat(openGroupDepth(source))}`);
    this.prefixCache.set(index, regex);
    return regex;
  }
}

class AssembledPattern implements CompiledPattern {
  constructor(
    readonly source: string,
    readonly regexp: RegExp,
    readonly fields: readonly string[],
    private readonly tracer?: FieldTracer,
    private readonly traceSink: TraceSink = process.stderr,
  ) {}

  exec(line: string): FieldMatch | null {
    this.tracer?.trace(line, this.traceSink);
    const match = this.regexp.exec(line);
    if (!match) {
      return null;
    }
    const values: Array<string | undefined> = this.fields.map((_, index) => match[index + 1]);
    const fields: Record<string, string | undefined> = {};
    this.fields.forEach((name, index) => {
      fields[name] = values[index];
    });
    return { values, fields };
  }
}

/**
 * Finds the first top-level field whose own text the engine rejects.
 */
const locateFailure = (segments: readonly MarkerSegment[]): string => {
  let coveredUntil = -1;
  for (const span of pairMarkers(segments, 'Tagged template')) {
    if (span.start < coveredUntil) {
      continue;
    }
    coveredUntil = span.end;
    const inner = segments
      .slice(span.start + 1, span.end)
      .map((segment) => (segment.kind === 'text' ? segment.value : ''))
      .join('');
    try {
      // eslint-disable-next-line no-new
      new RegExp(inner);
    } catch {
      return `field "${span.name}"`;
    }
  }
  return 'template';
};

/**
 * Anchors and compiles a resolved template.
 *
 * @throws PatternCompileError if the RegExp engine rejects the pattern
 */
export const assemblePattern = (
  resolved: ResolvedTemplate,
  options: AssembleOptions = {},
): CompiledPattern => {
  const segments = tokenizeMarkers(resolved.marked);
  const body = stripMarkers(resolved.marked);
  const source = `^${options.keepMarkers ? resolved.marked : body}$`;

  let regexp: RegExp;
  let tracer: FieldTracer | undefined;
  try {
    regexp = new RegExp(`^${body}$`);
    tracer = options.trace ? new FieldTracer(segments) : undefined;
  } catch (error) {
    const location = locateFailure(segments);
    throw new PatternCompileError(
      `Pattern rejected in ${location}: ${describeError(error)}`,
      { source, location, cause: error },
    );
  }

  return new AssembledPattern(source, regexp, [...resolved.captured], tracer, options.traceSink);
};
