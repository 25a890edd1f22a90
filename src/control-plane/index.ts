// Formatter
export {
  bold,
  dim,
  red,
  formatError,
  formatJson,
  formatOptionUsage,
  formatResolvedOptions,
  formatResolvedOptionsJson,
  print,
  printError,
} from './formatter.js';

// CLI
export {
  createProgram,
  runCli,
  createResolveCommand,
  createOptionsCommand,
} from './cli.js';
