/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { applyCaptureInstructions } from './capture-set.js';
import { templateFields } from './field-registry.js';
import { assemblePattern } from './pattern-assembler.js';
import { resolveTags } from './tag-resolver.js';
import { expandTemplate } from './token-expander.js';
import type { CaptureItem, CompiledPattern, Specialization, TraceSink } from './types.js';

export interface LogRegexpOptions {
  /** Log-format template; defaults to the specialization's default format. */
  format?: string;
  /** Fields (or `:none` / `:all`) to capture; replaces the specialization default. */
  capture?: readonly CaptureItem[];
  /** Keep the `(?#name)` markers in the compiled pattern source. */
  comments?: boolean;
  /** Report reached field boundaries while matching. */
  trace?: boolean;
  traceSink?: TraceSink;
}

/**
 * Compiles log-format templates into anchored regular expressions that
 * capture only the requested fields.
 *
 * @example
 * const log = new LogRegexp(foo, { format: '%d %c %b', capture: ['c'] });
 * const { regexp, fields } = log.compile(); // fields: ['c']
 */
export class LogRegexp {
  private format: string;
  private capture = new Set<string>();
  private comments: boolean;
  private trace: boolean;
  private traceSink?: TraceSink;
  private tagged?: string;

  constructor(
    readonly specialization: Specialization,
    options: LogRegexpOptions = {},
  ) {
    this.format = options.format ?? specialization.defaults.format;
    this.comments = options.comments ?? false;
    this.trace = options.trace ?? false;
    this.traceSink = options.traceSink;
    this.setCapture(...(options.capture ?? specialization.defaults.capture));
  }

  getFormat(): string {
    return this.format;
  }

  /**
   * Replaces the template. Returns the previous one.
   */
  setFormat(format: string): string {
    const previous = this.format;
    this.format = format;
    this.tagged = undefined;
    return previous;
  }

  /**
   * Fields that will be captured, in the order the compiled pattern
   * returns them (not the order they were requested in).
   */
  getCapture(): string[] {
    return templateFields(this.taggedTemplate()).filter((name) => this.capture.has(name));
  }

  /**
   * Applies field names and `:none` / `:all` directives left to right.
   * Names the template cannot produce are kept but never captured.
   *
   * @returns the new capture order
   */
  setCapture(...items: CaptureItem[]): string[] {
    this.capture = applyCaptureInstructions(items, this.capture, this.specialization.fields);
    return this.getCapture();
  }

  /** The requested field names, whether or not the template has them. */
  requestedFields(): Set<string> {
    return new Set(this.capture);
  }

  getComments(): boolean {
    return this.comments;
  }

  setComments(comments: boolean): boolean {
    const previous = this.comments;
    this.comments = comments;
    return previous;
  }

  getTrace(): boolean {
    return this.trace;
  }

  setTrace(trace: boolean, sink?: TraceSink): boolean {
    const previous = this.trace;
    this.trace = trace;
    if (sink) {
      this.traceSink = sink;
    }
    return previous;
  }

  /**
   * Every field the specialization's tokens can produce. Advisory: hooks
   * may add or remove fields.
   */
  allFields(): Set<string> {
    return new Set(this.specialization.fields);
  }

  /** Fields present in the current template, in template order. */
  templateFields(): string[] {
    return templateFields(this.taggedTemplate());
  }

  /**
   * The expanded template with field markers, cached until the format changes.
   */
  taggedTemplate(): string {
    if (this.tagged === undefined) {
      this.tagged = expandTemplate(this.format, this.specialization);
    }
    return this.tagged;
  }

  /**
   * Builds the anchored pattern for the current configuration.
   *
   * @throws ConfigurationError if hooks produced unbalanced markers
   * @throws PatternCompileError if the engine rejects the pattern
   */
  compile(): CompiledPattern {
    const resolved = resolveTags(this.taggedTemplate(), this.capture);
    return assemblePattern(resolved, {
      keepMarkers: this.comments,
      trace: this.trace,
      traceSink: this.traceSink,
    });
  }

  regexp(): RegExp {
    return this.compile().regexp;
  }
}
