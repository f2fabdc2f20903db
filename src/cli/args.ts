/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { resolve } from 'node:path';
import { parseCaptureList } from '../core/capture-set.js';
import { resolveCompilerConfigFromEnv, type CompilerEnvConfig } from '../config/compiler-config.js';

export const COMMANDS = ['compile', 'fields', 'match'] as const;
export type CommandName = (typeof COMMANDS)[number];

export interface RunnerOptions {
  command: CommandName;
  specialization: string;
  specializationDir?: string;
  format?: string;
  capture?: string[];
  comments: boolean;
  trace: boolean;
  inputPath: string;
  outputDir: string;
  limit?: number;
  batchSize?: number;
  interactive?: boolean;
}

const isCommand = (value: string): value is CommandName =>
  (COMMANDS as readonly string[]).includes(value);

const takeValue = (argv: string[], index: number, flag: string): string => {
  const value = argv[index];
  if (value === undefined) {
    throw new Error(`Missing value for ${flag}.`);
  }
  return value;
};

const takePositiveInteger = (argv: string[], index: number, flag: string): number => {
  const value = Number(takeValue(argv, index, flag));
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`${flag} expects a positive integer.`);
  }
  return value;
};

export const parseArgs = (
  argv: string[],
  defaults: CompilerEnvConfig = resolveCompilerConfigFromEnv(),
): RunnerOptions => {
  const options: RunnerOptions = {
    command: 'compile',
    specialization: defaults.specialization,
    specializationDir: defaults.specializationDir,
    comments: defaults.comments,
    trace: defaults.trace,
    inputPath: '',
    outputDir: defaults.outputDir,
  };

  let start = 0;
  const first = argv[0];
  if (first !== undefined && !first.startsWith('-')) {
    if (!isCommand(first)) {
      throw new Error(`Unknown command: ${first} (expected ${COMMANDS.join(', ')})`);
    }
    options.command = first;
    start = 1;
  }

  for (let i = start; i < argv.length; i += 1) {
    const arg = argv[i];
    switch (arg) {
      case '--spec':
      case '-s':
        options.specialization = takeValue(argv, ++i, arg);
        break;
      case '--spec-dir':
        options.specializationDir = resolve(takeValue(argv, ++i, arg));
        break;
      case '--format':
      case '-f':
        options.format = takeValue(argv, ++i, arg);
        break;
      case '--capture':
      case '-c':
        options.capture = [...(options.capture ?? []), ...parseCaptureList(takeValue(argv, ++i, arg))];
        break;
      case '--comments':
        options.comments = true;
        break;
      case '--trace':
        options.trace = true;
        break;
      case '--input':
      case '-i':
        options.inputPath = takeValue(argv, ++i, arg);
        break;
      case '--output':
      case '-o':
        options.outputDir = resolve(takeValue(argv, ++i, arg));
        break;
      case '--limit':
      case '-n':
        options.limit = takePositiveInteger(argv, ++i, arg);
        break;
      case '--batch-size':
        options.batchSize = takePositiveInteger(argv, ++i, arg);
        break;
      case '--interactive':
        options.interactive = true;
        break;
      default:
        throw new Error(`Unknown argument: ${arg}`);
    }
  }

  return options;
};
