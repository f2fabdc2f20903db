/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { promises as fs } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { basename, join, resolve } from 'node:path';
import { ConfigurationError, describeError } from '../core/errors.js';
import type { Specialization } from '../core/types.js';
import { fileExists, readJsonFile } from '../tools/files.js';
import { parseSpecializationFile, specializationFromFile } from './specialization-file.js';

export interface FileSpecializationStoreOptions {
  baseDir: string;
}

/**
 * Directory of the specializations shipped with the package.
 */
export const BUNDLED_SPECIALIZATION_DIR = fileURLToPath(
  new URL('../../specializations/', import.meta.url),
);

/**
 * Loads specializations stored as `<name>.json` files in one directory.
 * Loaded specializations are cached: they are immutable once defined.
 */
export class FileSpecializationStore {
  private readonly baseDir: string;
  private readonly cache = new Map<string, Specialization>();

  constructor(options: FileSpecializationStoreOptions) {
    this.baseDir = options.baseDir;
  }

  async listSpecializations(): Promise<string[]> {
    if (!(await fileExists(this.baseDir))) {
      return [];
    }
    const entries = await fs.readdir(this.baseDir);
    return entries
      .filter((entry) => entry.endsWith('.json'))
      .map((entry) => entry.replace(/\.json$/, ''))
      .sort();
  }

  async has(name: string): Promise<boolean> {
    return fileExists(this.resolvePath(name));
  }

  async loadSpecialization(name: string): Promise<Specialization> {
    const cached = this.cache.get(name);
    if (cached) {
      return cached;
    }
    const specialization = await loadSpecializationFile(this.resolvePath(name));
    this.cache.set(name, specialization);
    return specialization;
  }

  private resolvePath(name: string): string {
    return join(this.baseDir, `${name}.json`);
  }
}

/**
 * Reads and validates one specialization file.
 *
 * @throws ConfigurationError if the file is missing, not JSON, or malformed
 */
export const loadSpecializationFile = async (filePath: string): Promise<Specialization> => {
  if (!(await fileExists(filePath))) {
    throw new ConfigurationError(`Specialization file not found: ${filePath}`);
  }
  let data: unknown;
  try {
    data = await readJsonFile(filePath);
  } catch (error) {
    throw new ConfigurationError(`${filePath}: invalid JSON: ${describeError(error)}`, {
      cause: error,
    });
  }
  return specializationFromFile(parseSpecializationFile(data, basename(filePath)));
};

export interface ResolveSpecializationOptions {
  /** Searched before the bundled directory. */
  directories?: string[];
}

/**
 * Finds a specialization by file path or by name, looking through the given
 * directories and then the bundled ones.
 */
export const resolveSpecialization = async (
  reference: string,
  options: ResolveSpecializationOptions = {},
): Promise<Specialization> => {
  if (reference.endsWith('.json')) {
    return loadSpecializationFile(resolve(reference));
  }
  const stores = [...(options.directories ?? []), BUNDLED_SPECIALIZATION_DIR].map(
    (baseDir) => new FileSpecializationStore({ baseDir }),
  );
  for (const store of stores) {
    if (await store.has(reference)) {
      return store.loadSpecialization(reference);
    }
  }
  throw new ConfigurationError(`Unknown specialization "${reference}".`);
};

/**
 * Names available in the given directories and the bundled directory.
 */
export const listAvailableSpecializations = async (
  directories: string[] = [],
): Promise<string[]> => {
  const names = new Set<string>();
  for (const baseDir of [...directories, BUNDLED_SPECIALIZATION_DIR]) {
    for (const name of await new FileSpecializationStore({ baseDir }).listSpecializations()) {
      names.add(name);
    }
  }
  return [...names].sort();
};
