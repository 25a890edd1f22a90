import { getConfig } from '../config/index.js';

/**
 * Task file path or directory to load: the `--file` flag, then
 * TASKOPT_TASK_FILE, then the current directory.
 */
export function resolveTaskFileTarget(file: string | undefined): string {
  return file ?? getConfig().taskFile ?? process.cwd();
}
