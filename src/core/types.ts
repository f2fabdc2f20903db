/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Rewrites the intermediate template string. Hooks must not have other
 * effects visible to the compiler.
 */
export type TemplateHook = (template: string) => string;

/**
 * Declarative hook step, usable from JSON specialization files.
 */
export interface RewriteRule {
  pattern: string;
  flags?: string;
  replacement: string;
}

export type CaptureInstruction =
  | { kind: 'none' }
  | { kind: 'all' }
  | { kind: 'field'; name: string };

/**
 * A capture request: a field name, `:none`, `:all`, or an explicit instruction.
 */
export type CaptureItem = string | CaptureInstruction;

export interface SpecializationDefaults {
  format?: string;
  capture?: readonly CaptureItem[];
}

export interface SpecializationDefinition {
  name: string;
  tokens: Readonly<Record<string, string>>;
  aliases?: Readonly<Record<string, string>>;
  defaults?: SpecializationDefaults;
  preprocess?: TemplateHook;
  postprocess?: TemplateHook;
}

export interface TokenEntry {
  readonly token: string;
  readonly escaped: string;
  readonly fragment: string;
}

export interface Specialization {
  readonly name: string;
  readonly tokens: ReadonlyMap<string, string>;
  readonly aliases: ReadonlyMap<string, string>;
  readonly defaults: Readonly<{ format: string; capture: readonly CaptureItem[] }>;
  readonly preprocess: TemplateHook;
  readonly postprocess: TemplateHook;
  /** Tokens in substitution priority order (lexicographically last first). */
  readonly tokenOrder: readonly TokenEntry[];
  /** Every field name any fragment can produce. */
  readonly fields: ReadonlySet<string>;
}

export interface TraceSink {
  write(chunk: string): unknown;
}

export interface FieldMatch {
  /** Captured values, in `CompiledPattern.fields` order. */
  values: Array<string | undefined>;
  fields: Record<string, string | undefined>;
}

export interface CompiledPattern {
  /** Anchored pattern text; keeps field markers when comments are on. */
  readonly source: string;
  readonly regexp: RegExp;
  /** Captured field names, one per capturing group, in group order. */
  readonly fields: readonly string[];
  exec(line: string): FieldMatch | null;
}
