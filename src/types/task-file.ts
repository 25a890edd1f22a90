import type { Option } from './option.js';

/**
 * Search locations for the task file, relative to a directory.
 */
export const TASK_FILE_SEARCH_PATHS = ['tasks.yml', 'tasks.yaml', '.taskopt/tasks.yml'] as const;

// Parsed task file. Keys other than `options` are left to the task loader.
export interface TaskFile {
  /** Path the file was read from, or `<string>` for inline content */
  filePath: string;
  /** Options in declaration order */
  options: Option[];
}
