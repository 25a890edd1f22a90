// Option Types
export {
  NUMERIC_TYPE_HINTS,
  BOOLEAN_TYPE_HINTS,
  ValueSource,
  scalarSchema,
  whenDeclarationSchema,
  whenListDeclarationSchema,
  valueDeclarationSchema,
  defaultDeclarationSchema,
  optionDeclarationSchema,
  type When,
  type WhenList,
  type Value,
  type ValueList,
  type Option,
  type VariableMap,
  type WhenDeclaration,
  type ValueDeclaration,
  type OptionDeclaration,
} from './option.js';

// Task File Types
export {
  TASK_FILE_SEARCH_PATHS,
  type TaskFile,
} from './task-file.js';

// Resolution Types
export {
  type CommandRunner,
  type EnvLookup,
  type EvaluateContext,
  type ResolvedOption,
  type ResolveOptionsInput,
} from './resolution.js';
