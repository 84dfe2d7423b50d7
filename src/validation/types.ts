/**
 * Types for the JSON Schema validation module.
 */

import type { AnySchema } from 'ajv';

export type { AnySchema };

/**
 * One structural violation, with a JSON-pointer path to the offending value.
 */
export interface ValidationError {
  path: string;
  message: string;
  keyword: string;
  params?: Record<string, unknown>;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

/**
 * Options for creating a validator instance.
 */
export interface ValidatorOptions {
  /** Whether to use Ajv strict mode (default: false; remote schemas are often loose) */
  strict?: boolean;
  /** Whether to allow union types (default: true) */
  allowUnionTypes?: boolean;
  /** Fill in `default` values on validated data (default: true) */
  useDefaults?: boolean;
}

/**
 * A schema compiled once and applied to many argument objects.
 * Defaults are written into `data` when enabled.
 */
export type CompiledValidator = (data: unknown) => ValidationResult;
