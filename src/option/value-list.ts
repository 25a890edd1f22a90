/**
 * Resolution of ordered conditional defaults.
 */

import type { CommandRunner, ValueList, VariableMap } from '../types/index.js';
import { CommandExecutionError } from './errors.js';
import { matchesWhenList } from './when.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('value-list');

/**
 * Resolve a value list against the known variables.
 *
 * The first entry whose guard matches decides the result. A non-empty literal is returned
 * as is; otherwise the entry's command runs and its output is returned.
 *
 * @param valueList - Candidates in declaration order
 * @param vars - Resolved values of other options
 * @param runCommand - Command execution primitive
 * @returns The chosen value, or null when no guard matched
 * @throws CommandExecutionError if the chosen command fails
 */
export async function resolveValueList(
  valueList: ValueList,
  vars: VariableMap | null | undefined,
  runCommand: CommandRunner
): Promise<string | null> {
  for (const [index, candidate] of valueList.entries()) {
    if (!matchesWhenList(candidate.when, vars)) {
      continue;
    }

    if (candidate.value !== '') {
      log.debug({ index }, 'Default literal selected');
      return candidate.value;
    }

    if (candidate.command !== '') {
      log.debug({ index, command: candidate.command }, 'Default command selected');
      return runValueCommand(candidate.command, runCommand);
    }

    return '';
  }

  return null;
}

async function runValueCommand(command: string, runCommand: CommandRunner): Promise<string> {
  try {
    return await runCommand(command);
  } catch (error) {
    if (error instanceof CommandExecutionError) {
      throw error;
    }
    throw new CommandExecutionError(
      command,
      null,
      error instanceof Error ? error.message : String(error)
    );
  }
}
