/**
 * Shared builders for option tests.
 */

import { vi } from 'vitest';
import type { CommandRunner, EnvLookup, Value, When } from '../src/types/index.js';

type WhenOption = (when: When) => void;

export function createWhen(...options: WhenOption[]): When {
  const when: When = { equal: {}, notEqual: {} };
  for (const apply of options) {
    apply(when);
  }
  return when;
}

export function withWhenEqual(name: string, value: string): WhenOption {
  return (when) => {
    when.equal[name] = value;
  };
}

export function withWhenNotEqual(name: string, value: string): WhenOption {
  return (when) => {
    when.notEqual[name] = value;
  };
}

// Matches any variables
export const whenTrue: When = createWhen();

// Fails unless `never` is set, which no test does
export const whenFalse: When = createWhen(withWhenEqual('never', 'set'));

export function literal(value: string, when: When[] = []): Value {
  return { when, value, command: '' };
}

export function command(cmd: string, when: When[] = []): Value {
  return { when, value: '', command: cmd };
}

/**
 * Environment lookup over a fixed set of variables.
 */
export function envFrom(vars: Record<string, string>): EnvLookup {
  return (name) => (Object.hasOwn(vars, name) ? vars[name] : undefined);
}

/**
 * Command runner that answers from a table and records every call.
 */
export function fakeRunner(outputs: Record<string, string> = {}) {
  return vi.fn<CommandRunner>(async (cmd) => {
    const output = outputs[cmd];
    if (output === undefined) {
      throw new Error(`unexpected command: ${cmd}`);
    }
    return output;
  });
}
