import type { EvaluateContext } from '../types/index.js';
import { createCommandRunner } from './command-runner.js';
import { lookupProcessEnv } from './environment.js';

/**
 * Evaluation capabilities backed by the shell and the process environment.
 * Capabilities given in `overrides` replace the process-backed ones.
 */
export function createEvaluateContext(overrides: Partial<EvaluateContext> = {}): EvaluateContext {
  return {
    runCommand: overrides.runCommand ?? createCommandRunner(),
    lookupEnv: overrides.lookupEnv ?? lookupProcessEnv,
  };
}
