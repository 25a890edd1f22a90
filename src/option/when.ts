/**
 * Condition evaluation for conditional defaults.
 */

import type { VariableMap, When, WhenList } from '../types/index.js';

/**
 * Read a variable, treating a missing one as the empty string.
 */
export function lookupVariable(vars: VariableMap | null | undefined, name: string): string {
  if (!vars || !Object.hasOwn(vars, name)) {
    return '';
  }
  return vars[name] ?? '';
}

/**
 * Check a single condition against the known variables.
 * @param when - Condition to check
 * @param vars - Resolved values of other options
 * @returns True when every `equal` entry matches and no `notEqual` entry does
 */
export function matchesWhen(when: When, vars: VariableMap | null | undefined): boolean {
  for (const [name, expected] of Object.entries(when.equal)) {
    if (lookupVariable(vars, name) !== expected) {
      return false;
    }
  }

  for (const [name, forbidden] of Object.entries(when.notEqual)) {
    if (lookupVariable(vars, name) === forbidden) {
      return false;
    }
  }

  return true;
}

/**
 * Check every condition of a guard. An empty guard always matches.
 */
export function matchesWhenList(whenList: WhenList, vars: VariableMap | null | undefined): boolean {
  return whenList.every((when) => matchesWhen(when, vars));
}

/**
 * Variable names a guard reads, in first-seen order.
 */
export function whenListVariables(whenList: WhenList): string[] {
  const names = new Set<string>();
  for (const when of whenList) {
    for (const name of Object.keys(when.equal)) {
      names.add(name);
    }
    for (const name of Object.keys(when.notEqual)) {
      names.add(name);
    }
  }
  return [...names];
}
