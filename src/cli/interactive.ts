/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { resolve } from 'node:path';
import prompts from 'prompts';
import { parseCaptureList } from '../core/capture-set.js';
import { listAvailableSpecializations } from '../specializations/index.js';
import type { RunnerOptions } from './args.js';

export async function runInteractiveSetup(options: RunnerOptions): Promise<void> {
  const available = await listAvailableSpecializations(
    options.specializationDir ? [options.specializationDir] : [],
  );
  const initialSpec = Math.max(0, available.indexOf(options.specialization));

  const responses = await prompts(
    [
      {
        type: available.length > 0 ? 'select' : 'text',
        name: 'specialization',
        message: 'Log format specialization',
        choices: available.map((name) => ({ title: name, value: name })),
        initial: available.length > 0 ? initialSpec : options.specialization,
      },
      {
        type: 'text',
        name: 'format',
        message: 'Format template (leave empty for the specialization default)',
        initial: options.format ?? '',
      },
      {
        type: 'text',
        name: 'capture',
        message: 'Fields to capture (comma-separated, :all or :none)',
        initial: (options.capture ?? []).join(', '),
      },
      {
        type: options.command === 'match' ? 'text' : null,
        name: 'inputPath',
        message: 'Path to the log file to match',
        initial: options.inputPath,
      },
      {
        type: options.command === 'match' ? 'text' : null,
        name: 'outputDir',
        message: 'Directory to store reports',
        initial: options.outputDir,
      },
      {
        type: 'select',
        name: 'trace',
        message: 'Trace reached field boundaries?',
        choices: [
          { title: 'no', value: false },
          { title: 'yes', value: true },
        ],
        initial: options.trace ? 1 : 0,
      },
    ],
    {
      onCancel: () => {
        console.log('Interactive setup cancelled.');
        process.exit(1);
      },
    },
  );

  if (typeof responses.specialization === 'string' && responses.specialization.trim()) {
    options.specialization = responses.specialization.trim();
  }
  if (typeof responses.format === 'string' && responses.format.length > 0) {
    options.format = responses.format;
  }
  if (typeof responses.capture === 'string' && responses.capture.trim()) {
    options.capture = parseCaptureList(responses.capture);
  }
  if (typeof responses.inputPath === 'string' && responses.inputPath.trim()) {
    options.inputPath = responses.inputPath.trim();
  }
  if (typeof responses.outputDir === 'string' && responses.outputDir.trim()) {
    options.outputDir = resolve(responses.outputDir.trim());
  }
  if (typeof responses.trace === 'boolean') {
    options.trace = responses.trace;
  }
}
