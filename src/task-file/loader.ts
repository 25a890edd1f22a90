/**
 * Loader for task files.
 *
 * Only the `options:` block is read. It goes through the YAML document API so options
 * keep the order they were declared in, including keys that look like integers.
 */

import { readFile, access, stat } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { parseDocument, isMap, isScalar, isNode, type Document, type YAMLMap } from 'yaml';
import { TASK_FILE_SEARCH_PATHS, type TaskFile } from '../types/index.js';
import { DeclarationInvalidError } from '../option/errors.js';
import { decodeOptions, keepNumberSource } from '../option/decoder.js';
import { TaskFileNotFoundError, TaskFileParseError } from './errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('task-file');

/**
 * Parse task file content.
 * @param content - Raw YAML content string
 * @param filePath - Path reported in errors
 * @returns Parsed task file with options in declaration order
 * @throws TaskFileParseError if the YAML is malformed or its root is not a mapping
 * @throws DeclarationInvalidError if an option declaration is invalid
 */
export function parseTaskFile(content: string, filePath = '<string>'): TaskFile {
  const doc = parseDocument(content);

  const [firstError] = doc.errors;
  if (firstError) {
    throw new TaskFileParseError(filePath, firstError);
  }

  const root = doc.contents;
  if (root === null || (isScalar(root) && root.value === null)) {
    return { filePath, options: [] };
  }

  if (!isMap(root)) {
    throw new TaskFileParseError(filePath, new Error('task file must be a mapping'));
  }

  const optionsPair = root.items.find(
    (pair) => isScalar(pair.key) && pair.key.value === 'options'
  );
  const optionsNode = optionsPair?.value ?? null;
  if (optionsNode === null || (isScalar(optionsNode) && optionsNode.value === null)) {
    return { filePath, options: [] };
  }

  if (!isMap(optionsNode)) {
    throw new TaskFileParseError(filePath, new Error('options must be a mapping'));
  }

  keepNumberSource(optionsNode);
  const options = decodeOptions(orderedEntries(optionsNode, doc));
  log.debug({ filePath, optionCount: options.length }, 'Task file parsed');

  return { filePath, options };
}

/**
 * (key, value) pairs of a mapping node in document order.
 */
function orderedEntries(map: YAMLMap<unknown, unknown>, doc: Document): Array<[string, unknown]> {
  return map.items.map((pair): [string, unknown] => {
    const key = isScalar(pair.key) ? pair.key.value : pair.key;
    if (typeof key !== 'string' && typeof key !== 'number' && typeof key !== 'boolean') {
      throw new DeclarationInvalidError(String(key), ['option name must be a scalar']);
    }
    const value: unknown = isNode(pair.value) ? pair.value.toJS(doc) : pair.value;
    return [String(key), value];
  });
}

/**
 * Find the task file in a directory.
 * @param dir - Directory to search
 * @returns Path to the task file, or null if not found
 */
export async function findTaskFile(dir: string): Promise<string | null> {
  for (const relativePath of TASK_FILE_SEARCH_PATHS) {
    const fullPath = join(dir, relativePath);
    try {
      await access(fullPath);
      return fullPath;
    } catch {
      // File doesn't exist, continue searching
    }
  }
  return null;
}

/**
 * Get the search paths for task files.
 * @param dir - Directory to search
 * @returns Array of absolute paths that would be searched
 */
export function getSearchPaths(dir: string): string[] {
  return TASK_FILE_SEARCH_PATHS.map((p) => join(resolve(dir), p));
}

/**
 * Load and parse a task file.
 * @param pathOrDir - Task file path, or a directory to search
 * @returns Parsed task file
 * @throws TaskFileNotFoundError if no task file exists
 * @throws TaskFileParseError if the file cannot be read or parsed
 * @throws DeclarationInvalidError if an option declaration is invalid
 */
export async function loadTaskFile(pathOrDir: string): Promise<TaskFile> {
  const target = resolve(pathOrDir);

  let filePath: string | null = target;
  const isDirectory = await stat(target).then(
    (stats) => stats.isDirectory(),
    () => false
  );

  if (isDirectory) {
    filePath = await findTaskFile(target);
    if (!filePath) {
      throw new TaskFileNotFoundError(getSearchPaths(target));
    }
  }

  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new TaskFileNotFoundError([filePath]);
    }
    throw new TaskFileParseError(
      filePath,
      error instanceof Error ? error : new Error(String(error))
    );
  }

  return parseTaskFile(content, filePath);
}
