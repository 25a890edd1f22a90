/**
 * Dependency ordering for option resolution.
 */

import type { Option } from '../types/index.js';
import { optionDependencies } from '../option/option.js';
import { DependencyCycleError } from './errors.js';

/**
 * Order options so each one follows the options its defaults depend on.
 *
 * Among options whose dependencies are all placed, the earliest declared goes next.
 * Dependencies on names outside the set are ignored; callers supply those through `vars`.
 *
 * @param options - Options in declaration order
 * @returns A new array in evaluation order
 * @throws DependencyCycleError if the remaining options depend on each other
 */
export function orderOptions(options: readonly Option[]): Option[] {
  const declared = new Set(options.map((option) => option.name));
  const pending = options.map((option) => ({
    option,
    dependencies: optionDependencies(option).filter((name) => declared.has(name)),
  }));
  const placed = new Set<string>();
  const ordered: Option[] = [];

  while (pending.length > 0) {
    const readyIndex = pending.findIndex(({ dependencies }) =>
      dependencies.every((name) => placed.has(name))
    );

    const ready = readyIndex === -1 ? undefined : pending[readyIndex];
    if (!ready) {
      throw new DependencyCycleError(pending.map(({ option }) => option.name));
    }

    pending.splice(readyIndex, 1);
    placed.add(ready.option.name);
    ordered.push(ready.option);
  }

  return ordered;
}
