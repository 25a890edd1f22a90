import type { Option, ResolvedOption } from '../types/index.js';

/**
 * ANSI color codes for terminal output.
 */
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
} as const;

/**
 * Check if colors should be enabled.
 */
function useColors(): boolean {
  // Respect NO_COLOR environment variable
  if (process.env['NO_COLOR'] !== undefined) {
    return false;
  }
  // Respect FORCE_COLOR environment variable
  if (process.env['FORCE_COLOR'] !== undefined) {
    return true;
  }
  // Default: use colors if stdout is a TTY
  return process.stdout.isTTY ?? false;
}

/**
 * Apply color to text if colors are enabled.
 */
function colorize(text: string, color: keyof typeof colors): string {
  if (!useColors()) {
    return text;
  }
  return `${colors[color]}${text}${colors.reset}`;
}

export function bold(text: string): string {
  return colorize(text, 'bold');
}

export function dim(text: string): string {
  return colorize(text, 'dim');
}

export function red(text: string): string {
  return colorize(text, 'red');
}

/**
 * Format error message.
 */
export function formatError(message: string): string {
  return `${red('✗')} ${red(message)}`;
}

/**
 * Format JSON output.
 */
export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

/**
 * Format the flag column of an option, e.g. `-e, --env <string>`.
 */
function formatFlags(option: Option): string {
  const alias = option.short ? `-${option.short}, ` : '    ';
  const type = option.type ? ` <${option.type}>` : '';
  return `${alias}--${option.name}${type}`;
}

function formatDescription(option: Option): string {
  const allowed =
    option.valuesAllowed.length > 0 ? `(one of: ${option.valuesAllowed.join(', ')})` : '';
  return [option.usage, allowed].filter((part) => part !== '').join(' ');
}

/**
 * Usage listing of the options a task file exposes, in declaration order.
 * Private options are left out.
 */
export function formatOptionUsage(options: readonly Option[]): string {
  const visible = options.filter((option) => !option.private);
  const flags = visible.map(formatFlags);
  const width = Math.max(0, ...flags.map((flag) => flag.length));

  return visible
    .map((option, index) => {
      const description = formatDescription(option);
      const flag = flags[index] ?? '';
      return description ? `  ${flag.padEnd(width)}  ${description}` : `  ${flag}`;
    })
    .join('\n');
}

/**
 * Format resolved values as `name=value` lines.
 */
export function formatResolvedOptions(resolved: readonly ResolvedOption[]): string {
  return resolved.map(({ name, value }) => `${name}=${value}`).join('\n');
}

/**
 * Format resolved values as a JSON object keyed by option name.
 */
export function formatResolvedOptionsJson(resolved: readonly ResolvedOption[]): string {
  return formatJson(Object.fromEntries(resolved.map(({ name, value }) => [name, value])));
}

/**
 * Print to stdout.
 */
export function print(text: string): void {
  // eslint-disable-next-line no-console -- CLI output function
  console.log(text);
}

/**
 * Print error to stderr.
 */
export function printError(text: string): void {
  // eslint-disable-next-line no-console -- CLI error output function
  console.error(text);
}
