/**
 * Task File Loader Unit Tests
 */

import { describe, it, expect } from 'vitest';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  parseTaskFile,
  findTaskFile,
  loadTaskFile,
  getSearchPaths,
  TaskFileNotFoundError,
  TaskFileParseError,
} from '../src/task-file/index.js';
import { DeclarationInvalidError } from '../src/option/errors.js';

const FIXTURES_DIR = path.join(path.dirname(fileURLToPath(import.meta.url)), 'fixtures');

describe('Task file loader', () => {
  describe('parseTaskFile', () => {
    it('should keep options in declaration order', () => {
      const taskFile = parseTaskFile(`
options:
  zeta:
    usage: declared first
  10:
    usage: integer-like key
  alpha:
    usage: declared last
`);

      expect(taskFile.options.map((option) => option.name)).toEqual(['zeta', '10', 'alpha']);
      expect(taskFile.options[1]?.usage).toBe('integer-like key');
    });

    it('should keep numeric names and values as written', () => {
      const taskFile = parseTaskFile(`
options:
  010:
    default: 1.10
    values: [1.10, 0x10]
`);

      expect(taskFile.options[0]).toMatchObject({
        name: '010',
        defaultValues: [{ when: [], value: '1.10', command: '' }],
        valuesAllowed: ['1.10', '0x10'],
      });
    });

    it('should ignore keys other than options', () => {
      const taskFile = parseTaskFile(`
tasks:
  build:
    run: make
options:
  target:
    default: all
`);

      expect(taskFile.options).toHaveLength(1);
      expect(taskFile.options[0]).toMatchObject({
        name: 'target',
        defaultValues: [{ when: [], value: 'all', command: '' }],
      });
    });

    it('should report the file path', () => {
      expect(parseTaskFile('', 'tasks.yml').filePath).toBe('tasks.yml');
      expect(parseTaskFile('').filePath).toBe('<string>');
    });

    it.each([
      ['an empty document', ''],
      ['a document without options', 'tasks: {}'],
      ['an empty options block', 'options:'],
    ])('should return no options for %s', (_desc, content) => {
      expect(parseTaskFile(content).options).toEqual([]);
    });

    it.each([
      ['malformed YAML', 'options: {foo: ['],
      ['a non-mapping root', '- options'],
      ['a non-mapping options block', 'options: [foo, bar]'],
      ['duplicate option names', 'options:\n  foo: {}\n  foo: {}\n'],
    ])('should reject %s', (_desc, content) => {
      expect(() => parseTaskFile(content)).toThrow(TaskFileParseError);
    });

    it('should reject invalid option declarations', () => {
      expect(() => parseTaskFile('options:\n  foo: string only\n')).toThrow(
        DeclarationInvalidError
      );
    });
  });

  describe('findTaskFile', () => {
    it('should find tasks.yml in a directory', async () => {
      await expect(findTaskFile(path.join(FIXTURES_DIR, 'project'))).resolves.toBe(
        path.join(FIXTURES_DIR, 'project', 'tasks.yml')
      );
    });

    it('should find a task file under .taskopt', async () => {
      await expect(findTaskFile(path.join(FIXTURES_DIR, 'nested'))).resolves.toBe(
        path.join(FIXTURES_DIR, 'nested', '.taskopt', 'tasks.yml')
      );
    });

    it('should return null when no task file exists', async () => {
      await expect(findTaskFile(FIXTURES_DIR)).resolves.toBeNull();
    });
  });

  describe('getSearchPaths', () => {
    it('should list every candidate location', () => {
      expect(getSearchPaths('/work')).toEqual([
        path.join('/work', 'tasks.yml'),
        path.join('/work', 'tasks.yaml'),
        path.join('/work', '.taskopt', 'tasks.yml'),
      ]);
    });
  });

  describe('loadTaskFile', () => {
    it('should load a task file by path', async () => {
      const filePath = path.join(FIXTURES_DIR, 'project', 'tasks.yml');
      const taskFile = await loadTaskFile(filePath);

      expect(taskFile.filePath).toBe(filePath);
      expect(taskFile.options.map((option) => option.name)).toEqual([
        'host',
        'stage',
        'verbose',
        'build-id',
      ]);
      expect(taskFile.options[3]).toMatchObject({
        private: true,
        defaultValues: [{ when: [], value: '', command: 'echo build-42' }],
      });
    });

    it('should search a directory', async () => {
      const taskFile = await loadTaskFile(path.join(FIXTURES_DIR, 'nested'));

      expect(taskFile.options).toHaveLength(1);
      expect(taskFile.options[0]?.name).toBe('name');
    });

    it('should throw TaskFileNotFoundError for a directory without a task file', async () => {
      const error = await loadTaskFile(FIXTURES_DIR).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TaskFileNotFoundError);
      expect(error).toMatchObject({ searchPaths: getSearchPaths(FIXTURES_DIR) });
    });

    it('should throw TaskFileNotFoundError for a missing file', async () => {
      const filePath = path.join(FIXTURES_DIR, 'missing.yml');

      await expect(loadTaskFile(filePath)).rejects.toThrow(
        `Task file not found. Searched locations: ${filePath}`
      );
    });

    it('should surface declaration errors', async () => {
      await expect(loadTaskFile(path.join(FIXTURES_DIR, 'invalid-option.yml'))).rejects.toThrow(
        'Invalid declaration for option token: required and default are mutually exclusive'
      );
    });
  });
});
