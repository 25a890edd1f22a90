/**
 * Custom error types for the task file loader.
 */

/**
 * Error thrown when a task file cannot be found.
 */
export class TaskFileNotFoundError extends Error {
  override readonly name = 'TaskFileNotFoundError';
  readonly searchPaths: string[];

  constructor(searchPaths: string[]) {
    super(`Task file not found. Searched locations: ${searchPaths.join(', ')}`);
    this.searchPaths = searchPaths;
    Object.setPrototypeOf(this, TaskFileNotFoundError.prototype);
  }
}

/**
 * Error thrown when a task file cannot be read or parsed.
 */
export class TaskFileParseError extends Error {
  override readonly name = 'TaskFileParseError';
  readonly filePath: string;
  readonly parseError: Error;

  constructor(filePath: string, parseError: Error) {
    super(`Failed to parse task file at ${filePath}: ${parseError.message}`);
    this.filePath = filePath;
    this.parseError = parseError;
    Object.setPrototypeOf(this, TaskFileParseError.prototype);
  }
}
