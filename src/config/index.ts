/**
 * taskopt Configuration Module
 *
 * Centralizes all configuration reading from environment variables
 * with validation and defaults.
 */

import { z } from 'zod';
import { createLogger } from '../utils/logger.js';

const log = createLogger('config');

/**
 * Configuration schema with validation
 */
const configSchema = z.object({
  // Shell used to run command-backed defaults
  shell: z.string().min(1).default('sh'),

  // Command timeout in milliseconds (0 disables, max 1 hour)
  commandTimeoutMs: z.coerce.number().int().min(0).max(3600000).default(0),

  // Task file used when none is given on the command line
  taskFile: z.string().min(1).optional(),
});

export type TaskoptConfig = z.infer<typeof configSchema>;

/**
 * Load configuration from environment variables
 */
export function loadConfig(): TaskoptConfig {
  const raw = {
    shell: process.env.TASKOPT_SHELL || undefined,
    commandTimeoutMs: process.env.TASKOPT_COMMAND_TIMEOUT_MS || undefined,
    taskFile: process.env.TASKOPT_TASK_FILE || undefined,
  };

  const result = configSchema.safeParse(raw);

  if (!result.success) {
    log.error({ errors: result.error.errors }, 'Invalid configuration');
    throw new Error(`Configuration validation failed: ${result.error.message}`);
  }

  log.debug(
    {
      shell: result.data.shell,
      commandTimeoutMs: result.data.commandTimeoutMs,
      taskFile: result.data.taskFile,
    },
    'Configuration loaded'
  );

  return result.data;
}

/**
 * Singleton configuration instance
 */
let configInstance: TaskoptConfig | null = null;

/**
 * Get the configuration singleton
 */
export function getConfig(): TaskoptConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset configuration (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}
