/**
 * Option resolution engine.
 */

export {
  createOption,
  evaluateOption,
  optionDependencies,
  typeFallbackValue,
} from './option.js';
export { resolveValueList } from './value-list.js';
export { matchesWhen, matchesWhenList, whenListVariables, lookupVariable } from './when.js';
export { decodeOption, decodeOptions, parseOption } from './decoder.js';
export {
  MissingRequiredValueError,
  InvalidValueError,
  CommandExecutionError,
  DeclarationInvalidError,
} from './errors.js';
