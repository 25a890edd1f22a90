/**
 * Option model and the resolution algorithm.
 *
 * Precedence, first success wins:
 *   passed value → environment variable → conditional defaults
 * followed by allow-list validation and the type fallback for empty results.
 */

import {
  BOOLEAN_TYPE_HINTS,
  NUMERIC_TYPE_HINTS,
  ValueSource,
  type EvaluateContext,
  type Option,
  type VariableMap,
} from '../types/index.js';
import { CommandExecutionError, InvalidValueError, MissingRequiredValueError } from './errors.js';
import { resolveValueList } from './value-list.js';
import { whenListVariables } from './when.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('option');

const numericTypeHints = new Set<string>(NUMERIC_TYPE_HINTS);
const booleanTypeHints = new Set<string>(BOOLEAN_TYPE_HINTS);

/**
 * Build an option with every field at its zero value, then apply overrides.
 */
export function createOption(overrides: Partial<Option> = {}): Option {
  return {
    name: '',
    short: '',
    usage: '',
    type: '',
    private: false,
    required: false,
    environment: '',
    passed: '',
    defaultValues: [],
    valuesAllowed: [],
    ...overrides,
  };
}

/**
 * Names of the other options this option's defaults depend on.
 * Collected from every guard of every default, without duplicates.
 */
export function optionDependencies(option: Option): string[] {
  const names = new Set<string>();
  for (const candidate of option.defaultValues) {
    for (const name of whenListVariables(candidate.when)) {
      names.add(name);
    }
  }
  return [...names];
}

/**
 * Value an empty result falls back to for the option's type hint.
 */
export function typeFallbackValue(type: string): string {
  const hint = type.toLowerCase();
  if (numericTypeHints.has(hint)) {
    return '0';
  }
  if (booleanTypeHints.has(hint)) {
    return 'false';
  }
  return '';
}

/**
 * Compute the runtime value of an option.
 *
 * @param option - Option to evaluate; an absent option resolves to ""
 * @param vars - Resolved values of other options, read by default guards
 * @param context - Command runner and environment lookup
 * @returns The resolved value
 * @throws MissingRequiredValueError if a required option has no passed or environment value
 * @throws InvalidValueError if the value is not one of the allowed values
 * @throws CommandExecutionError if the selected default command fails
 */
export async function evaluateOption(
  option: Option | null | undefined,
  vars: VariableMap | null = null,
  context: EvaluateContext
): Promise<string> {
  if (!option) {
    return '';
  }

  const { lookupEnv, runCommand } = context;
  let value = '';
  let source: ValueSource = ValueSource.DEFAULT;

  if (option.passed !== '') {
    value = option.passed;
    source = ValueSource.PASSED;
  } else {
    const envValue = option.environment !== '' ? lookupEnv(option.environment) : undefined;

    if (envValue !== undefined && envValue !== '') {
      value = envValue;
      source = ValueSource.ENVIRONMENT;
    } else if (option.required) {
      throw new MissingRequiredValueError(option.name, option.environment);
    } else {
      try {
        value = (await resolveValueList(option.defaultValues, vars, runCommand)) ?? '';
      } catch (error) {
        if (error instanceof CommandExecutionError && option.name !== '') {
          throw error.forOption(option.name);
        }
        throw error;
      }
    }
  }

  if (value !== '' && option.valuesAllowed.length > 0 && !option.valuesAllowed.includes(value)) {
    throw new InvalidValueError(option.name, value, option.valuesAllowed, source);
  }

  if (value === '') {
    value = typeFallbackValue(option.type);
    source = ValueSource.TYPE_FALLBACK;
  }

  log.debug({ option: option.name, source }, 'Option resolved');
  return value;
}
