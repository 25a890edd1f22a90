/**
 * Decoding of option declarations from parsed YAML.
 */

import { parseDocument, visit, type Document, type Node } from 'yaml';
import { ZodError } from 'zod';
import {
  optionDeclarationSchema,
  type Option,
  type OptionDeclaration,
  type ValueDeclaration,
  type ValueList,
  type WhenDeclaration,
  type WhenList,
} from '../types/index.js';
import { DeclarationInvalidError } from './errors.js';
import { createOption } from './option.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('decoder');

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Decode one option from a parsed YAML value.
 * @param body - The option's mapping, as produced by the YAML parser
 * @param name - Mapping key the option was declared under
 * @returns Decoded option with `name` assigned and `passed` empty
 * @throws DeclarationInvalidError if the body is not a mapping or breaks a declaration rule
 */
export function decodeOption(body: unknown, name = ''): Option {
  if (!isRecord(body)) {
    throw new DeclarationInvalidError(name, ['option must be defined as a mapping']);
  }

  let declaration: OptionDeclaration;
  try {
    declaration = optionDeclarationSchema.parse(body);
  } catch (error) {
    if (error instanceof ZodError) {
      const violations = error.errors.map(
        (e) => `${e.path.length > 0 ? e.path.join('.') : 'option'}: ${e.message}`
      );
      throw new DeclarationInvalidError(name, violations);
    }
    throw error;
  }

  const violations = checkDeclaration(declaration);
  if (violations.length > 0) {
    throw new DeclarationInvalidError(name, violations);
  }

  const defaultValues = toValueList(declaration.default ?? []);
  warnOnConflictingDefaults(name, defaultValues);

  return createOption({
    name,
    short: declaration.short,
    usage: declaration.usage,
    type: declaration.type,
    private: declaration.private,
    required: declaration.required,
    environment: declaration.environment,
    defaultValues,
    valuesAllowed: declaration.values,
  });
}

/**
 * Decode named options in declaration order.
 * @param entries - (name, body) pairs in the order they were declared
 * @returns Options in the same order, each named after its key
 * @throws DeclarationInvalidError if a body is invalid or a name repeats
 */
export function decodeOptions(entries: Iterable<readonly [string, unknown]>): Option[] {
  const options: Option[] = [];
  const seen = new Set<string>();

  for (const [name, body] of entries) {
    if (seen.has(name)) {
      throw new DeclarationInvalidError(name, ['option is declared more than once']);
    }
    seen.add(name);
    options.push(decodeOption(body, name));
  }

  return options;
}

/**
 * Parse a single option body from YAML text.
 * @throws DeclarationInvalidError if the text is not valid YAML or not a valid option
 */
export function parseOption(content: string, name = ''): Option {
  const doc = parseDocument(content);

  const [firstError] = doc.errors;
  if (firstError) {
    throw new DeclarationInvalidError(name, [`invalid YAML: ${firstError.message}`]);
  }

  keepNumberSource(doc);
  return decodeOption(doc.toJS(), name);
}

/**
 * Replace numeric scalars with the text they were written as.
 *
 * Option values are strings, so `1.10`, `0x10` and integers beyond 2^53 must keep
 * their spelling instead of going through a JS number. Applies to mapping keys too.
 */
export function keepNumberSource(node: Document | Node): void {
  visit(node, {
    Scalar(_key, scalar) {
      const isNumber = typeof scalar.value === 'number' || typeof scalar.value === 'bigint';
      if (isNumber && scalar.source !== undefined) {
        scalar.value = scalar.source;
      }
    },
  });
}

/**
 * Cross-field rules the schema cannot express.
 */
function checkDeclaration(declaration: OptionDeclaration): string[] {
  const violations: string[] = [];

  if ([...declaration.short].length > 1) {
    violations.push(`short: must be a single character, got "${declaration.short}"`);
  }

  if (declaration.private) {
    if (declaration.required) {
      violations.push('private and required are mutually exclusive');
    }
    if (declaration.environment !== '') {
      violations.push('private and environment are mutually exclusive');
    }
    if (declaration.values.length > 0) {
      violations.push('private and values are mutually exclusive');
    }
  }

  if (declaration.required && declaration.default !== undefined) {
    violations.push('required and default are mutually exclusive');
  }

  return violations;
}

function toWhenList(whenList: WhenDeclaration[]): WhenList {
  return whenList.map((when) => ({ equal: when.equal, notEqual: when.not_equal }));
}

function toValueList(entries: ValueDeclaration[]): ValueList {
  return entries.map((entry) => ({
    when: toWhenList(entry.when),
    value: entry.value,
    command: entry.command,
  }));
}

function warnOnConflictingDefaults(name: string, defaultValues: ValueList): void {
  defaultValues.forEach((candidate, index) => {
    if (candidate.value !== '' && candidate.command !== '') {
      log.warn(
        { option: name, index, command: candidate.command },
        'Default declares both a value and a command; the value is used'
      );
    }
  });
}
