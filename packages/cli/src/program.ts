import { Command, CommanderError, type OutputConfiguration } from 'commander';
import { registerMirror } from './commands/mirror.js';
import { registerDigest } from './commands/digest.js';
import { MIRROR_EXIT_CODES } from './utils/exit-codes.js';

export interface CreateProgramOptions {
  /** Redirects commander's own help and usage output */
  output?: OutputConfiguration;
}

export function createProgram(options: CreateProgramOptions = {}): Command {
  const program = new Command();

  program
    .name('hashmirror')
    .description('One-way directory mirror that copies files only when their content changed')
    .version('0.1.0')
    .exitOverride();

  if (options.output) {
    program.configureOutput(options.output);
  }

  // Subcommands inherit exitOverride and output settings, so register last.
  registerMirror(program);
  registerDigest(program);

  return program;
}

/**
 * Parses `argv` (node-style, with the executable and script first) and runs
 * the matching command. Usage errors from commander map to the configuration
 * exit code; help and version output exit cleanly.
 */
export async function runCli(argv: readonly string[], program = createProgram()): Promise<void> {
  try {
    await program.parseAsync([...argv]);
  } catch (error) {
    if (error instanceof CommanderError) {
      process.exitCode = error.exitCode === 0 ? MIRROR_EXIT_CODES.SUCCESS : MIRROR_EXIT_CODES.CONFIGURATION;
      return;
    }
    throw error;
  }
}
