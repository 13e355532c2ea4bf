import chalk from 'chalk';
import { ConfigurationError, MirrorError, SourceNotFoundError } from '@hashmirror/core';
import { MIRROR_EXIT_CODES, setExitCode, type MirrorExitCode } from './exit-codes.js';

export class CliError extends Error {
  constructor(message: string, public exitCode: MirrorExitCode = MIRROR_EXIT_CODES.ERROR) {
    super(message);
    this.name = 'CliError';
  }
}

type MaybePromise<T> = T | Promise<T>;

export function exitCodeForError(error: unknown): MirrorExitCode {
  if (error instanceof CliError) return error.exitCode;
  if (error instanceof ConfigurationError) return MIRROR_EXIT_CODES.CONFIGURATION;
  if (error instanceof SourceNotFoundError) return MIRROR_EXIT_CODES.SOURCE_NOT_FOUND;
  return MIRROR_EXIT_CODES.ERROR;
}

export function withErrorHandling<A extends unknown[], R>(
  action: (...args: A) => MaybePromise<R>
): (...args: A) => Promise<Awaited<R> | undefined> {
  return async (...args: A): Promise<Awaited<R> | undefined> => {
    try {
      return await action(...args);
    } catch (error) {
      if (error instanceof CliError || error instanceof MirrorError) {
        console.error(chalk.red(error.message));
        setExitCode(exitCodeForError(error));
        return undefined;
      }

      const message = error instanceof Error ? error.message : String(error);
      console.error(chalk.red(`Unexpected error: ${message}`));
      if (error instanceof Error && error.stack) {
        console.error(chalk.gray(error.stack));
      }
      setExitCode(MIRROR_EXIT_CODES.ERROR);
      return undefined;
    }
  };
}
