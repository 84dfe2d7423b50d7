/**
 * AjvValidator — structural validation of tool arguments against JSON Schema.
 *
 * Used for tools whose parameters arrive as JSON Schema (MCP servers, OpenAPI
 * operations) rather than as a zod shape. Ajv is configured once at
 * construction time; schemas are compiled once per tool.
 */

import { Ajv2020 } from 'ajv/dist/2020.js';
import type { ErrorObject } from 'ajv';
import type {
  AnySchema,
  CompiledValidator,
  ValidationError,
  ValidationResult,
  ValidatorOptions,
} from './types.js';

const DEFAULT_OPTIONS: Required<ValidatorOptions> = {
  strict: false,
  allowUnionTypes: true,
  useDefaults: true,
};

/**
 * Convert an Ajv ErrorObject to our ValidationError format.
 */
function convertAjvError(error: ErrorObject): ValidationError {
  const path = error.instancePath || '/';
  const params: Record<string, unknown> = { ...error.params };

  let message = error.message ?? 'Validation failed';
  switch (error.keyword) {
    case 'required':
      if (typeof params.missingProperty === 'string') {
        message = `Missing required property: ${params.missingProperty}`;
      }
      break;
    case 'type':
      if (params.type !== undefined) {
        message = `Expected type: ${String(params.type)}`;
      }
      break;
    case 'enum':
      if (Array.isArray(params.allowedValues)) {
        message = `Must be one of: ${params.allowedValues.map(String).join(', ')}`;
      }
      break;
    case 'additionalProperties':
      if (typeof params.additionalProperty === 'string') {
        message = `Unknown property: ${params.additionalProperty}`;
      }
      break;
    case 'minimum':
    case 'exclusiveMinimum':
      if (typeof params.limit === 'number') {
        message = `Must be >= ${params.limit}`;
      }
      break;
    case 'maximum':
    case 'exclusiveMaximum':
      if (typeof params.limit === 'number') {
        message = `Must be <= ${params.limit}`;
      }
      break;
  }

  return { path, message, keyword: error.keyword, params };
}

export class AjvValidator {
  private readonly ajv: Ajv2020;

  constructor(options: ValidatorOptions = {}) {
    const opts = { ...DEFAULT_OPTIONS, ...options };

    this.ajv = new Ajv2020({
      strict: opts.strict,
      allowUnionTypes: opts.allowUnionTypes,
      useDefaults: opts.useDefaults,
      allErrors: true,
      // Formats are not checked; unknown ones must not fail compilation.
      validateFormats: false,
      logger: false,
    });
  }

  /**
   * Compile a schema into a reusable validator.
   *
   * @throws if the schema itself is invalid
   */
  compile(schema: AnySchema): CompiledValidator {
    const validateFn = this.ajv.compile(schema);
    return (data: unknown): ValidationResult => {
      if (validateFn(data)) {
        return { valid: true, errors: [] };
      }
      return { valid: false, errors: (validateFn.errors ?? []).map(convertAjvError) };
    };
  }
}

/**
 * Create a new AjvValidator instance.
 */
export function createValidator(options?: ValidatorOptions): AjvValidator {
  return new AjvValidator(options);
}
