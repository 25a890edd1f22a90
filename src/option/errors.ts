/**
 * Custom error types for option declaration and resolution.
 */

import type { ValueSource } from '../types/index.js';

/**
 * Error thrown when a required option has neither a passed nor an environment value.
 */
export class MissingRequiredValueError extends Error {
  override readonly name = 'MissingRequiredValueError';
  readonly optionName: string;
  readonly environment: string;

  constructor(optionName: string, environment: string) {
    const hint = environment ? ` (set it or export ${environment})` : '';
    super(`No value passed for required option: ${optionName}${hint}`);
    this.optionName = optionName;
    this.environment = environment;
    Object.setPrototypeOf(this, MissingRequiredValueError.prototype);
  }
}

/**
 * Error thrown when a resolved value is not one of the allowed values.
 */
export class InvalidValueError extends Error {
  override readonly name = 'InvalidValueError';
  readonly optionName: string;
  readonly value: string;
  readonly valuesAllowed: string[];
  readonly source: ValueSource;

  constructor(optionName: string, value: string, valuesAllowed: string[], source: ValueSource) {
    super(
      `Value "${value}" for option ${optionName} must be one of: ${valuesAllowed.join(', ')}`
    );
    this.optionName = optionName;
    this.value = value;
    this.valuesAllowed = valuesAllowed;
    this.source = source;
    Object.setPrototypeOf(this, InvalidValueError.prototype);
  }
}

/**
 * Error thrown when a command-backed default fails to run or exits non-zero.
 */
export class CommandExecutionError extends Error {
  override readonly name = 'CommandExecutionError';
  readonly command: string;
  readonly exitCode: number | null;
  readonly stderr: string;
  readonly optionName: string | null;

  constructor(
    command: string,
    exitCode: number | null,
    stderr: string,
    optionName: string | null = null
  ) {
    const target = optionName ? ` for option ${optionName}` : '';
    const status = exitCode === null ? 'could not be run' : `exited with code ${exitCode}`;
    const detail = stderr ? `: ${stderr}` : '';
    super(`Command "${command}"${target} ${status}${detail}`);
    this.command = command;
    this.exitCode = exitCode;
    this.stderr = stderr;
    this.optionName = optionName;
    Object.setPrototypeOf(this, CommandExecutionError.prototype);
  }

  /**
   * Copy of this error attributed to an option.
   */
  forOption(optionName: string): CommandExecutionError {
    return new CommandExecutionError(this.command, this.exitCode, this.stderr, optionName);
  }
}

/**
 * Error thrown when an option declaration breaks a structural rule.
 */
export class DeclarationInvalidError extends Error {
  override readonly name = 'DeclarationInvalidError';
  readonly optionName: string;
  readonly violations: string[];

  constructor(optionName: string, violations: string[]) {
    const subject = optionName ? `option ${optionName}` : 'option';
    super(`Invalid declaration for ${subject}: ${violations.join('; ')}`);
    this.optionName = optionName;
    this.violations = violations;
    Object.setPrototypeOf(this, DeclarationInvalidError.prototype);
  }
}
