/**
 * Parameter models: a JSON Schema for the tool description plus a validator
 * that checks (and fills defaults into) the keyword arguments of a call.
 *
 * Local functions get a zod model, either from an explicit raw shape or from
 * the names their signature destructures. Remote tools get an Ajv model
 * compiled from the JSON Schema the remote side publishes. When no model can
 * be built the tool runs in passthrough mode.
 */

import { z } from 'zod';
import { ToolValidationError } from '../errors.js';
import { isRecord } from '../schema/json-schema.js';
import type { AjvValidator } from '../validation/AjvValidator.js';
import type { ToolFunction } from './invocable.js';
import { readSignature, type LiteralValue, type SignatureParameter } from './signature.js';

export type ParameterShape = Record<string, z.ZodType>;

export interface ParameterModel {
  /** JSON Schema of the argument object (no `$schema` key) */
  readonly jsonSchema: Record<string, unknown>;
  /**
   * Validate a call's arguments.
   *
   * @returns the arguments with defaults applied
   * @throws ToolValidationError
   */
  validate(args: Record<string, unknown>): Record<string, unknown>;
}

function withoutMetaSchema(schema: Record<string, unknown>): Record<string, unknown> {
  const { $schema: _ignored, ...rest } = schema;
  return rest;
}

/**
 * Wrap a zod object schema as a parameter model.
 *
 * @throws if the schema has no JSON Schema rendering
 */
export function zodParameterModel(schema: z.ZodType<Record<string, unknown>>): ParameterModel {
  const jsonSchema = withoutMetaSchema(z.toJSONSchema(schema, { io: 'input' }));

  return {
    jsonSchema,
    validate(args) {
      const parsed = schema.safeParse(args);
      if (!parsed.success) {
        throw new ToolValidationError(
          parsed.error.issues.map((issue) => ({
            path: issue.path.map(String).join('.'),
            message: issue.message,
          })),
        );
      }
      return parsed.data;
    },
  };
}

function fieldForDefault(value: LiteralValue): z.ZodType {
  switch (typeof value) {
    case 'string':
      return z.string().default(value);
    case 'number':
      return z.number().default(value);
    case 'boolean':
      return z.boolean().default(value);
    default:
      return z.unknown().default(value);
  }
}

function fieldFor(param: SignatureParameter): z.ZodType {
  switch (param.kind) {
    case 'required':
      // Untyped but present
      return z.unknown().refine((value) => value !== undefined, { error: 'Required' });
    case 'literal-default':
      return fieldForDefault(param.defaultValue);
    case 'optional':
      return z.unknown().optional();
  }
}

/**
 * Build the parameter model of a local function.
 *
 * Returns `undefined` when neither an explicit shape nor a readable signature
 * is available, or when the shape cannot be rendered as JSON Schema.
 */
export function buildParameterModel(
  fn: ToolFunction,
  shape?: ParameterShape,
): ParameterModel | undefined {
  try {
    if (shape !== undefined) {
      return zodParameterModel(z.object(shape));
    }

    const signature = readSignature(fn);
    if (signature === undefined) {
      return undefined;
    }
    const fields: Record<string, z.ZodType> = {};
    for (const param of signature) {
      fields[param.name] = fieldFor(param);
    }
    // Extra keys pass through to the function untouched.
    return zodParameterModel(z.looseObject(fields));
  } catch {
    return undefined;
  }
}

/**
 * Wrap a published JSON Schema with an Ajv-compiled validator.
 *
 * Returns `undefined` when the schema does not compile.
 */
export function jsonSchemaModel(
  schema: Record<string, unknown>,
  validator: AjvValidator,
): ParameterModel | undefined {
  const jsonSchema = withoutMetaSchema(schema);
  let check: ReturnType<AjvValidator['compile']>;
  try {
    check = validator.compile(jsonSchema);
  } catch {
    return undefined;
  }

  return {
    jsonSchema,
    validate(args) {
      const data: Record<string, unknown> = { ...args };
      const result = check(data);
      if (!result.valid) {
        throw new ToolValidationError(
          result.errors.map((error) => ({
            path: error.path === '/' ? '' : error.path.slice(1).replace(/\//g, '.'),
            message: error.message,
          })),
        );
      }
      return data;
    },
  };
}

/**
 * Whether a value can be used as a call's keyword-argument object.
 */
export function isArgumentObject(value: unknown): value is Record<string, unknown> {
  return isRecord(value);
}
