export { createCommandRunner, type CommandRunnerOptions } from './command-runner.js';
export { lookupProcessEnv } from './environment.js';
export { createEvaluateContext } from './context.js';
