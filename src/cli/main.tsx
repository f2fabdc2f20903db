/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { render } from 'ink';
import type { LogMatchOptions } from '../runner/index.js';
import { resolveSpecialization } from '../specializations/index.js';
import { LogRegexpApp } from '../ui/log-regexp-app.js';
import { parseArgs } from './args.js';
import { runCompileCommand, runFieldsCommand } from './commands.js';
import { runInteractiveSetup } from './interactive.js';

export const main = async (argv: string[] = process.argv.slice(2)): Promise<void> => {
  const options = parseArgs(argv);

  if (options.interactive) {
    await runInteractiveSetup(options);
  }

  const specialization = await resolveSpecialization(options.specialization, {
    directories: options.specializationDir ? [options.specializationDir] : [],
  });

  if (options.command === 'compile') {
    runCompileCommand(specialization, options);
    return;
  }
  if (options.command === 'fields') {
    runFieldsCommand(specialization, options);
    return;
  }

  if (!options.inputPath) {
    throw new Error('Missing --input <path> argument.');
  }

  const matchOptions: LogMatchOptions = {
    inputPath: options.inputPath,
    outputDir: options.outputDir,
    specialization,
    format: options.format,
    capture: options.capture,
    trace: options.trace,
    limit: options.limit,
    batchSize: options.batchSize,
  };

  const { waitUntilExit } = render(<LogRegexpApp options={matchOptions} />);
  await waitUntilExit();
};
