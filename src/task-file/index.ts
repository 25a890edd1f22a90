export { parseTaskFile, findTaskFile, loadTaskFile, getSearchPaths } from './loader.js';
export { TaskFileNotFoundError, TaskFileParseError } from './errors.js';
