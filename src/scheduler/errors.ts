/**
 * Custom error types for option scheduling.
 */

/**
 * Error thrown when option defaults depend on each other in a cycle.
 */
export class DependencyCycleError extends Error {
  override readonly name = 'DependencyCycleError';
  readonly optionNames: string[];

  constructor(optionNames: string[]) {
    super(`Options depend on each other in a cycle: ${optionNames.join(', ')}`);
    this.optionNames = optionNames;
    Object.setPrototypeOf(this, DependencyCycleError.prototype);
  }
}

/**
 * Error thrown when a value is passed for an option that cannot accept one.
 */
export class UnknownOptionError extends Error {
  override readonly name = 'UnknownOptionError';
  readonly optionName: string;

  constructor(optionName: string) {
    super(`No option named ${optionName} accepts a passed value`);
    this.optionName = optionName;
    Object.setPrototypeOf(this, UnknownOptionError.prototype);
  }
}
