import { Command } from 'commander';
import { loadTaskFile } from '../../task-file/index.js';
import { print, printError, formatError, formatOptionUsage, bold, dim } from '../formatter.js';
import { resolveTaskFileTarget } from '../task-file-path.js';

interface OptionsListOptions {
  file?: string;
}

/**
 * Create the options command.
 */
export function createOptionsCommand(): Command {
  const command = new Command('options')
    .description('List the options a task file accepts')
    .option('-f, --file <path>', 'Task file or directory containing one')
    .action(async (options: OptionsListOptions) => {
      try {
        await executeOptions(options);
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

/**
 * Execute the options command.
 */
export async function executeOptions(options: OptionsListOptions): Promise<void> {
  const taskFile = await loadTaskFile(resolveTaskFileTarget(options.file));
  const listing = formatOptionUsage(taskFile.options);

  if (listing === '') {
    print(dim(`No options declared in ${taskFile.filePath}`));
    return;
  }

  print(bold('Options:'));
  print(listing);
}
