import { Command } from 'commander';
import { loadTaskFile } from '../../task-file/index.js';
import { resolveOptions } from '../../scheduler/index.js';
import {
  print,
  printError,
  formatError,
  formatResolvedOptions,
  formatResolvedOptionsJson,
} from '../formatter.js';
import { resolveTaskFileTarget } from '../task-file-path.js';

interface ResolveOptions {
  file?: string;
  set: string[];
  json?: boolean;
}

/**
 * Create the resolve command.
 */
export function createResolveCommand(): Command {
  const command = new Command('resolve')
    .description('Resolve every option of a task file and print the values')
    .option('-f, --file <path>', 'Task file or directory containing one')
    .option(
      '-s, --set <name=value>',
      'Pass a value for an option (repeatable)',
      collectAssignment,
      []
    )
    .option('-j, --json', 'Output result as JSON', false)
    .action(async (options: ResolveOptions) => {
      try {
        await executeResolve(options);
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

function collectAssignment(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Split `name=value` assignments into passed values.
 * The first `=` separates name from value, so values may contain `=`.
 */
export function parseAssignments(assignments: readonly string[]): Record<string, string> {
  const passed = new Map<string, string>();

  for (const assignment of assignments) {
    const separator = assignment.indexOf('=');
    const name = separator === -1 ? '' : assignment.slice(0, separator).trim();
    if (name === '') {
      throw new Error(`Invalid assignment "${assignment}": expected name=value`);
    }
    passed.set(name, assignment.slice(separator + 1));
  }

  return Object.fromEntries(passed);
}

/**
 * Execute the resolve command.
 */
export async function executeResolve(options: ResolveOptions): Promise<void> {
  const passed = parseAssignments(options.set);
  const taskFile = await loadTaskFile(resolveTaskFileTarget(options.file));
  const resolved = await resolveOptions(taskFile.options, { passed });

  if (options.json) {
    print(formatResolvedOptionsJson(resolved));
  } else if (resolved.length > 0) {
    print(formatResolvedOptions(resolved));
  }
}
