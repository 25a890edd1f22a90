import { Command } from 'commander';
import { createResolveCommand } from './commands/resolve.js';
import { createOptionsCommand } from './commands/options.js';

/**
 * Package version - will be updated during build
 */
const VERSION = '0.1.0';

/**
 * Create and configure the CLI program.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('taskopt')
    .description('Resolve the options of a YAML task file')
    .version(VERSION, '-v, --version', 'Output the current version');

  program.addCommand(createResolveCommand());
  program.addCommand(createOptionsCommand());

  // Error handling
  program.exitOverride();

  return program;
}

/**
 * Run the CLI program.
 */
export async function runCli(args: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(args);
  } catch (error) {
    // Commander throws an error on --help and --version
    // We don't want to treat these as errors
    if (
      error instanceof Error &&
      'code' in error &&
      (error.code === 'commander.helpDisplayed' ||
        error.code === 'commander.version' ||
        error.code === 'commander.help')
    ) {
      return;
    }

    // Re-throw other errors
    throw error;
  }
}

export { createResolveCommand } from './commands/resolve.js';
export { createOptionsCommand } from './commands/options.js';
