/**
 * Default command execution primitive for command-backed defaults.
 */

import { execa } from 'execa';
import type { CommandRunner } from '../types/index.js';
import { CommandExecutionError } from '../option/errors.js';
import { getConfig } from '../config/index.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('command-runner');

export interface CommandRunnerOptions {
  /** Shell invoked as `<shell> -c <command>` */
  shell?: string;
  /** Working directory, defaults to the current one */
  cwd?: string;
  /** Kill the command after this many milliseconds (0 = never) */
  timeoutMs?: number;
}

/**
 * Create a command runner backed by a shell subprocess.
 * Unset options fall back to the loaded configuration.
 */
export function createCommandRunner(options: CommandRunnerOptions = {}): CommandRunner {
  return async (command: string): Promise<string> => {
    const config = getConfig();
    const shell = options.shell ?? config.shell;
    const timeoutMs = options.timeoutMs ?? config.commandTimeoutMs;
    const startTime = Date.now();

    log.debug({ command, shell, timeoutMs }, 'Running command');

    const result = await execa(shell, ['-c', command], {
      cwd: options.cwd ?? process.cwd(),
      timeout: timeoutMs > 0 ? timeoutMs : undefined,
      reject: false,
      stdin: 'ignore',
    });

    if (result.failed) {
      const stderr = result.timedOut
        ? `timed out after ${timeoutMs}ms`
        : result.stderr.trim() || (result.shortMessage ?? '');
      log.debug({ command, exitCode: result.exitCode, stderr }, 'Command failed');
      throw new CommandExecutionError(command, result.exitCode ?? null, stderr);
    }

    log.debug({ command, durationMs: Date.now() - startTime }, 'Command completed');
    return result.stdout.trim();
  };
}
