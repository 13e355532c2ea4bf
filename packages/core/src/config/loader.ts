/**
 * Configuration file loading utilities
 */

import fs from 'fs/promises';
import path from 'path';
import { ConfigurationError, errnoOf, errorMessage } from '../errors.js';
import type { MirrorConfig } from './types.js';
import { normalizeMirrorConfig } from './normalizer.js';

export interface LoadConfigResult {
  config: MirrorConfig;
  configPath: string;
}

/**
 * Load and normalize a JSON config file. Relative paths resolve against `cwd`.
 */
export async function loadMirrorConfig(
  configPath: string,
  options?: { cwd?: string }
): Promise<LoadConfigResult> {
  const cwd = options?.cwd ?? process.cwd();
  const resolvedPath = path.resolve(cwd, configPath);
  let fileContents: string;

  try {
    fileContents = await fs.readFile(resolvedPath, 'utf-8');
  } catch (error) {
    if (errnoOf(error) === 'ENOENT') {
      throw new ConfigurationError(`Config file not found at ${resolvedPath}`);
    }
    throw new ConfigurationError(`Unable to read config file at ${resolvedPath}: ${errorMessage(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fileContents);
  } catch (error) {
    throw new ConfigurationError(
      `Config file at ${resolvedPath} contains invalid JSON: ${errorMessage(error)}`
    );
  }

  return {
    config: normalizeMirrorConfig(parsed),
    configPath: resolvedPath,
  };
}
