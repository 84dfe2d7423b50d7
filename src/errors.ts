/**
 * Error types raised by the registry, its adapters and the executor.
 *
 * Every error carries a stable `code` so callers can branch without matching
 * on messages. Tool invocation failures are not thrown at callers of
 * `Tool.run`/`Tool.arun` or the executor; those report error strings instead.
 */

export class ToolRegistryError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = 'ToolRegistryError';
  }
}

/** A tool could not be given a name. */
export class ToolNamingError extends ToolRegistryError {
  constructor(message: string) {
    super('TOOL_NAMING', message);
    this.name = 'ToolNamingError';
  }
}

export class InvalidMergeTargetError extends ToolRegistryError {
  constructor(message = 'merge() expects a ToolRegistry') {
    super('INVALID_MERGE_TARGET', message);
    this.name = 'InvalidMergeTargetError';
  }
}

export class SpinoffError extends ToolRegistryError {
  readonly prefix: string;

  constructor(prefix: string) {
    super('SPINOFF_NO_MATCH', `No tools with namespace '${prefix}' found in registry`);
    this.name = 'SpinoffError';
    this.prefix = prefix;
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

/**
 * Arguments rejected by a tool's parameter model.
 */
export class ToolValidationError extends ToolRegistryError {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    super('TOOL_VALIDATION', formatIssues(issues));
    this.name = 'ToolValidationError';
    this.issues = issues;
  }
}

function formatIssues(issues: ValidationIssue[]): string {
  if (issues.length === 0) {
    return 'Invalid arguments';
  }
  return issues.map((issue) => `${issue.path || '(root)'}: ${issue.message}`).join('; ');
}

/** The process pool cannot accept work. */
export class PoolUnavailableError extends ToolRegistryError {
  constructor(reason: string, options?: { cause?: unknown }) {
    super('POOL_UNAVAILABLE', reason, options);
    this.name = 'PoolUnavailableError';
  }
}

export class WorkerCrashedError extends ToolRegistryError {
  readonly exitCode: number | null;
  readonly signal: string | null;

  constructor(exitCode: number | null, signal: string | null) {
    super(
      'WORKER_CRASHED',
      `worker process exited unexpectedly (code ${exitCode ?? 'null'}, signal ${signal ?? 'null'})`,
    );
    this.name = 'WorkerCrashedError';
    this.exitCode = exitCode;
    this.signal = signal;
  }
}

export class ClassInstantiationError extends ToolRegistryError {
  constructor(className: string, cause?: unknown) {
    const detail = cause instanceof Error ? `: ${cause.message}` : '';
    super(
      'CLASS_INSTANTIATION',
      `Class '${className}' cannot be instantiated without arguments${detail}`,
      cause === undefined ? undefined : { cause },
    );
    this.name = 'ClassInstantiationError';
  }
}

/** The MCP server reported a failed tool call. */
export class McpToolError extends ToolRegistryError {
  constructor(toolName: string, detail: string) {
    super('MCP_TOOL_ERROR', `MCP tool '${toolName}' failed: ${detail}`);
    this.name = 'McpToolError';
  }
}

export class HttpToolError extends ToolRegistryError {
  readonly status: number;
  readonly body: string;

  constructor(status: number, statusText: string, body: string) {
    super('HTTP_ERROR', `HTTP ${status} ${statusText}${body ? `: ${body}` : ''}`);
    this.name = 'HttpToolError';
    this.status = status;
    this.body = body;
  }
}

export class OpenApiSpecError extends ToolRegistryError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('OPENAPI_SPEC', message, options);
    this.name = 'OpenApiSpecError';
  }
}

/**
 * Config validation error.
 */
export class ConfigValidationError extends ToolRegistryError {
  readonly path: string;
  readonly value: unknown;

  constructor(message: string, path: string, value: unknown) {
    super('CONFIG_VALIDATION', `Config validation error at '${path}': ${message}`);
    this.name = 'ConfigValidationError';
    this.path = path;
    this.value = value;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
