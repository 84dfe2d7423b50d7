/**
 * OpenAPI document loading.
 *
 * Accepts a local file (JSON or YAML) or a URL. For a URL the well-known
 * document locations under it are tried first, then the URL itself is
 * fetched. In-document `$ref`s are resolved before the shape is checked.
 */

import { readFile } from 'node:fs/promises';
import type { Logger } from 'pino';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { OpenApiSpecError, errorMessage } from '../../errors.js';
import { dereferenceLocalRefs } from '../../schema/json-schema.js';

export type FetchFn = typeof fetch;

export const COMMON_SPEC_ENDPOINTS = [
  '/openapi.json',
  '/swagger.json',
  '/api-docs',
  '/v3/api-docs',
  '/swagger.yaml',
  '/openapi.yaml',
] as const;

export const HTTP_METHODS = ['get', 'post', 'put', 'delete'] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

// ============================================================================
// Document shape
// ============================================================================

export const ParameterObjectSchema = z.looseObject({
  name: z.string(),
  in: z.enum(['query', 'path', 'header', 'cookie']),
  required: z.boolean().optional(),
  description: z.string().optional(),
  schema: z.record(z.string(), z.unknown()).optional(),
});

export const OperationObjectSchema = z.looseObject({
  operationId: z.string().optional(),
  summary: z.string().optional(),
  description: z.string().optional(),
  parameters: z.array(ParameterObjectSchema).optional(),
  requestBody: z
    .looseObject({
      required: z.boolean().optional(),
      content: z
        .record(z.string(), z.looseObject({ schema: z.record(z.string(), z.unknown()).optional() }))
        .optional(),
    })
    .optional(),
});

export const PathItemSchema = z.looseObject({
  parameters: z.array(ParameterObjectSchema).optional(),
  get: OperationObjectSchema.optional(),
  post: OperationObjectSchema.optional(),
  put: OperationObjectSchema.optional(),
  delete: OperationObjectSchema.optional(),
});

export const OpenApiDocumentSchema = z
  .looseObject({
    openapi: z.string().optional(),
    swagger: z.string().optional(),
    info: z.looseObject({ title: z.string().optional(), version: z.string().optional() }).optional(),
    servers: z.array(z.looseObject({ url: z.string() })).optional(),
    paths: z.record(z.string(), PathItemSchema).default({}),
  })
  .refine((doc) => doc.openapi !== undefined || doc.swagger !== undefined, {
    error: "missing 'openapi' version field",
  });

export type ParameterObject = z.infer<typeof ParameterObjectSchema>;
export type OperationObject = z.infer<typeof OperationObjectSchema>;
export type OpenApiDocument = z.infer<typeof OpenApiDocumentSchema>;

// ============================================================================
// Loading
// ============================================================================

export interface LoadOptions {
  fetch?: FetchFn;
  /** Per-request timeout for URL sources */
  timeoutMs?: number;
  logger?: Logger;
}

function isUrl(source: string): boolean {
  return /^https?:\/\//i.test(source);
}

/**
 * Parse a JSON or YAML document, resolve its refs and check its shape.
 *
 * @throws OpenApiSpecError
 */
export function parseOpenApiDocument(text: string, origin: string): OpenApiDocument {
  let raw: unknown;
  try {
    // YAML is a superset of JSON; one parser covers both.
    raw = parseYaml(text);
  } catch (err) {
    throw new OpenApiSpecError(`Failed to parse OpenAPI document ${origin}: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  const parsed = OpenApiDocumentSchema.safeParse(dereferenceLocalRefs(raw));
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.map(String).join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new OpenApiSpecError(`Invalid OpenAPI document ${origin}: ${detail}`);
  }
  return parsed.data;
}

async function fetchText(
  url: string,
  fetchFn: FetchFn,
  timeoutMs: number | undefined,
): Promise<{ ok: boolean; status: number; contentType: string; text: string }> {
  const response = await fetchFn(url, {
    ...(timeoutMs === undefined ? {} : { signal: AbortSignal.timeout(timeoutMs) }),
  });
  return {
    ok: response.ok,
    status: response.status,
    contentType: (response.headers.get('content-type') ?? '').toLowerCase(),
    text: await response.text(),
  };
}

/**
 * Try the well-known document locations under `baseUrl`.
 * Returns the first response that looks like a JSON or YAML document.
 */
async function fetchCommonEndpoints(
  baseUrl: string,
  fetchFn: FetchFn,
  options: LoadOptions,
): Promise<{ url: string; text: string } | undefined> {
  const base = baseUrl.replace(/\/+$/, '');
  for (const endpoint of COMMON_SPEC_ENDPOINTS) {
    const url = `${base}${endpoint}`;
    try {
      const response = await fetchText(url, fetchFn, options.timeoutMs);
      if (response.ok && /json|yaml/.test(response.contentType)) {
        return { url, text: response.text };
      }
    } catch (err) {
      options.logger?.debug({ url, err }, 'OpenAPI endpoint request failed');
    }
  }
  return undefined;
}

/**
 * Load an OpenAPI document from a file path or URL.
 *
 * @throws OpenApiSpecError
 */
export async function loadOpenApiSpec(source: string, options: LoadOptions = {}): Promise<OpenApiDocument> {
  if (!isUrl(source)) {
    let text: string;
    try {
      text = await readFile(source, 'utf-8');
    } catch (err) {
      throw new OpenApiSpecError(`Cannot read OpenAPI document ${source}: ${errorMessage(err)}`, { cause: err });
    }
    return parseOpenApiDocument(text, source);
  }

  const fetchFn = options.fetch ?? fetch;
  const discovered = await fetchCommonEndpoints(source, fetchFn, options);
  if (discovered) {
    try {
      return parseOpenApiDocument(discovered.text, discovered.url);
    } catch (err) {
      // Fall through to the URL as given.
      options.logger?.debug({ url: discovered.url, err }, 'discovered document is not a usable OpenAPI document');
    }
  }

  let response: Awaited<ReturnType<typeof fetchText>>;
  try {
    response = await fetchText(source, fetchFn, options.timeoutMs);
  } catch (err) {
    throw new OpenApiSpecError(`Could not retrieve OpenAPI document from ${source}: ${errorMessage(err)}`, {
      cause: err,
    });
  }
  if (!response.ok) {
    throw new OpenApiSpecError(`Could not retrieve OpenAPI document from ${source}: HTTP ${response.status}`);
  }
  return parseOpenApiDocument(response.text, source);
}
