/**
 * Sequential resolution of a whole options block.
 */

import type { Option, ResolvedOption, ResolveOptionsInput } from '../types/index.js';
import { evaluateOption } from '../option/option.js';
import { createEvaluateContext } from '../runtime/context.js';
import { UnknownOptionError } from './errors.js';
import { orderOptions } from './order.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('scheduler');

/**
 * Resolve every option, feeding each result to the options evaluated after it.
 *
 * @param options - Options in declaration order
 * @param input - Passed values, initial variables and evaluation capabilities
 * @returns Resolved values in declaration order
 * @throws UnknownOptionError if a passed value names an undeclared or private option
 * @throws DependencyCycleError if defaults depend on each other in a cycle
 */
export async function resolveOptions(
  options: readonly Option[],
  input: ResolveOptionsInput = {}
): Promise<ResolvedOption[]> {
  const passed = input.passed ?? {};
  const byName = new Map(options.map((option) => [option.name, option]));

  for (const name of Object.keys(passed)) {
    const option = byName.get(name);
    if (!option || option.private) {
      throw new UnknownOptionError(name);
    }
  }

  const withPassed = options.map((option) =>
    Object.hasOwn(passed, option.name)
      ? { ...option, passed: passed[option.name] ?? '' }
      : option
  );

  const context = createEvaluateContext(input.context);
  // Map keeps names such as `__proto__` as plain entries
  const resolved = new Map<string, string>(Object.entries(input.vars ?? {}));
  const startTime = Date.now();

  for (const option of orderOptions(withPassed)) {
    resolved.set(option.name, await evaluateOption(option, Object.fromEntries(resolved), context));
  }

  log.debug(
    { optionCount: options.length, durationMs: Date.now() - startTime },
    'Options resolved'
  );

  return options.map((option) => ({ name: option.name, value: resolved.get(option.name) ?? '' }));
}
