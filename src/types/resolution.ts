import type { VariableMap } from './option.js';

/**
 * Runs a shell command in the task's working environment.
 * Resolves with trimmed stdout, rejects on launch failure or non-zero exit.
 */
export type CommandRunner = (command: string) => Promise<string>;

/**
 * Reads a process environment variable. `undefined` means unset.
 */
export type EnvLookup = (name: string) => string | undefined;

// Capabilities injected into option evaluation
export interface EvaluateContext {
  runCommand: CommandRunner;
  lookupEnv: EnvLookup;
}

export interface ResolvedOption {
  name: string;
  value: string;
}

export interface ResolveOptionsInput {
  /** Passed values by option name */
  passed?: Readonly<Record<string, string>>;
  /** Variables known before any option resolves */
  vars?: VariableMap;
  context?: Partial<EvaluateContext>;
}
