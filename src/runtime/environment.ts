import type { EnvLookup } from '../types/index.js';

/**
 * Environment lookup over the current process environment.
 */
export const lookupProcessEnv: EnvLookup = (name) => process.env[name];
