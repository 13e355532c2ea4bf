import {
  loadMirrorConfig,
  mergeMirrorConfig,
  normalizeAlgorithm,
  normalizeNumber,
  stripSurroundingQuotes,
  type MirrorConfig,
  type MirrorOptionsInput,
} from '@hashmirror/core';

/** Raw option bag as commander hands it to the mirror action */
export interface MirrorCommandOptions {
  algorithm?: string;
  blockSize?: string;
  config?: string;
  dryRun?: boolean;
  concurrency?: string;
  matchAbsolute?: boolean;
  json?: boolean;
  report?: string;
  quiet?: boolean;
  exclude?: string[];
}

/**
 * Only flags that were actually passed end up in the result, so that a config
 * file value is never overwritten by an absent flag.
 */
export function configFromFlags(options: MirrorCommandOptions): MirrorConfig {
  const config: MirrorConfig = {};

  const algorithm = normalizeAlgorithm(options.algorithm);
  if (algorithm !== undefined) config.algorithm = algorithm;

  const blockSize = normalizeNumber(options.blockSize);
  if (blockSize !== undefined) config.blockSize = blockSize;

  const concurrency = normalizeNumber(options.concurrency);
  if (concurrency !== undefined) config.concurrency = concurrency;

  if (options.exclude?.length) config.exclude = [...options.exclude];
  if (options.matchAbsolute) config.matchAbsolutePaths = true;

  return config;
}

export async function buildMirrorInput(
  source: string,
  destination: string,
  options: MirrorCommandOptions,
  cwd = process.cwd()
): Promise<MirrorOptionsInput> {
  const fileConfig = options.config ? (await loadMirrorConfig(options.config, { cwd })).config : {};
  const merged = mergeMirrorConfig(fileConfig, configFromFlags(options));

  return {
    ...merged,
    source: stripSurroundingQuotes(source),
    destination: stripSurroundingQuotes(destination),
    dryRun: options.dryRun ?? false,
  };
}
