import { z } from 'zod';

// Type hints that fall back to "0" when nothing else resolves
export const NUMERIC_TYPE_HINTS = ['int', 'integer', 'float', 'float64', 'double'] as const;

// Type hints that fall back to "false" when nothing else resolves
export const BOOLEAN_TYPE_HINTS = ['bool', 'boolean'] as const;

// Where a resolved value came from
export const ValueSource = {
  PASSED: 'passed',
  ENVIRONMENT: 'environment',
  DEFAULT: 'default',
  TYPE_FALLBACK: 'type_fallback',
} as const;

export type ValueSource = (typeof ValueSource)[keyof typeof ValueSource];

/**
 * A single predicate over the resolved values of other options.
 * Every `equal` entry must match and no `notEqual` entry may match.
 */
export interface When {
  equal: Record<string, string>;
  notEqual: Record<string, string>;
}

/** Conjunction of conditions. The empty list always matches. */
export type WhenList = When[];

/**
 * One candidate default. A non-empty literal `value` takes precedence over `command`.
 */
export interface Value {
  when: WhenList;
  value: string;
  command: string;
}

/** Ordered candidates, first matching guard wins. */
export type ValueList = Value[];

/**
 * A named, configurable input to a task.
 */
export interface Option {
  /** Assigned from the declaration's mapping key */
  name: string;
  /** Single-character flag alias */
  short: string;
  usage: string;
  /** Free-form, case-insensitive type hint */
  type: string;
  /** Not exposed to the invocation surface */
  private: boolean;
  /** Value must come from a passed value or the environment */
  required: boolean;
  /** Environment variable read as a candidate value */
  environment: string;
  /** Value supplied by the invocation layer just before evaluation */
  passed: string;
  defaultValues: ValueList;
  valuesAllowed: string[];
}

/**
 * Known variables at evaluation time: the resolved values of other options.
 */
export type VariableMap = Readonly<Record<string, string>>;

// YAML scalars are read as their string form
export const scalarSchema = z
  .union([z.string(), z.number(), z.boolean()])
  .transform((value) => String(value));

// Condition: `{ equal: {...}, not_equal: {...} }`
export const whenDeclarationSchema = z
  .object({
    equal: z.record(scalarSchema).default({}),
    not_equal: z.record(scalarSchema).default({}),
  })
  .strict();

export type WhenDeclaration = z.infer<typeof whenDeclarationSchema>;

// `when` takes a single condition or a list of them
export const whenListDeclarationSchema = z
  .union([whenDeclarationSchema, z.array(whenDeclarationSchema)])
  .transform((when) => (Array.isArray(when) ? when : [when]));

// Default entry: a bare scalar literal, or `{ when, value | command }`
export const valueDeclarationSchema = z.union([
  scalarSchema.transform(
    (value): { when: WhenDeclaration[]; value: string; command: string } => ({
      when: [],
      value,
      command: '',
    })
  ),
  z
    .object({
      when: whenListDeclarationSchema.default([]),
      value: scalarSchema.default(''),
      command: z.string().default(''),
    })
    .strict(),
]);

export type ValueDeclaration = z.infer<typeof valueDeclarationSchema>;

// `default` takes a single entry or a list of them
export const defaultDeclarationSchema = z
  .union([valueDeclarationSchema, z.array(valueDeclarationSchema)])
  .transform((entries) => (Array.isArray(entries) ? entries : [entries]));

// Body of one option under the `options:` block of a task file
export const optionDeclarationSchema = z
  .object({
    usage: z.string().default(''),
    short: z.string().default(''),
    type: z.string().default(''),
    private: z.boolean().default(false),
    required: z.boolean().default(false),
    environment: z.string().default(''),
    default: defaultDeclarationSchema.optional(),
    values: z.array(scalarSchema).default([]),
  })
  .strict();

export type OptionDeclaration = z.infer<typeof optionDeclarationSchema>;
