/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export * from './types.js';
export * from './errors.js';
export { LogRegexp, type LogRegexpOptions } from './log-regexp.js';
export {
  defineSpecialization,
  extendSpecialization,
  rewriteHook,
  type SpecializationOverrides,
} from './specialization.js';
export { expandTemplate, escapeRegex, resolveAlias, substituteTokens } from './token-expander.js';
export { allFieldNames, templateFields, validateFragment } from './field-registry.js';
export {
  applyCaptureInstructions,
  parseCaptureList,
  selectField,
  toCaptureInstruction,
  SELECT_ALL,
  SELECT_NONE,
} from './capture-set.js';
export { resolveTags, type ResolvedTemplate } from './tag-resolver.js';
export { assemblePattern, type AssembleOptions } from './pattern-assembler.js';
export { colorizeMarkers, stripMarkers } from './markers.js';
export { logConsole, BufferedTraceSink } from './logging.js';
