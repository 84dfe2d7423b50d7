/**
 * Signature reader.
 *
 * Tools take a single keyword-argument object, so the only signature shape we
 * can describe is a destructured first parameter:
 *
 *   function search({ query, limit = 10 }) { ... }
 *
 * The reader works on the function's source text. Anything it cannot read
 * (native or bound functions, positional parameters, computed keys) yields
 * `undefined` and the caller falls back to passthrough.
 */

import type { ToolFunction } from './invocable.js';

export type LiteralValue =
  | string
  | number
  | boolean
  | null
  | LiteralValue[]
  | { [key: string]: LiteralValue };

export type SignatureParameter =
  | { name: string; kind: 'required' }
  | { name: string; kind: 'literal-default'; defaultValue: LiteralValue }
  | { name: string; kind: 'optional' };

const OPENERS: Record<string, string> = { '(': ')', '[': ']', '{': '}' };
const CLOSERS = new Set([')', ']', '}']);
const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

/**
 * Split `text` at top-level occurrences of `separator`, skipping over
 * brackets, string literals and template literals.
 */
function splitTopLevel(text: string, separator: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let quote: string | null = null;
  let start = 0;

  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);
    if (quote !== null) {
      if (ch === '\\') {
        i++;
      } else if (ch === quote) {
        quote = null;
      }
      continue;
    }
    if (ch === '"' || ch === "'" || ch === '`') {
      quote = ch;
    } else if (ch in OPENERS) {
      depth++;
    } else if (CLOSERS.has(ch)) {
      depth--;
    } else if (ch === separator && depth === 0) {
      parts.push(text.slice(start, i));
      start = i + 1;
    }
  }
  parts.push(text.slice(start));
  return parts.map((part) => part.trim());
}

/**
 * Index of the bracket closing the one at `open`, or -1.
 */
function findClosing(text: string, open: number): number {
  const expected = OPENERS[text.charAt(open)];
  if (expected === undefined) {
    return -1;
  }
  const stack: string[] = [expected];
  let quote: string | null = null;

  for (let i = open + 1; i < text.length; i++) {
    const ch = text.charAt(i);
    if (quote !== null) {
      if (ch === '\\') {
        i++;
      } else if (ch === quote) {
        quote = null;
      }
      continue;
    }
    if (ch === '"' || ch === "'" || ch === '`') {
      quote = ch;
      continue;
    }
    const closer = OPENERS[ch];
    if (closer !== undefined) {
      stack.push(closer);
    } else if (CLOSERS.has(ch)) {
      if (stack.pop() !== ch) {
        return -1;
      }
      if (stack.length === 0) {
        return i;
      }
    }
  }
  return -1;
}

/**
 * Index of the first top-level `=` that is an assignment (not `=>`, `==`).
 */
function findDefaultSeparator(entry: string): number {
  let depth = 0;
  let quote: string | null = null;
  for (let i = 0; i < entry.length; i++) {
    const ch = entry.charAt(i);
    if (quote !== null) {
      if (ch === '\\') {
        i++;
      } else if (ch === quote) {
        quote = null;
      }
      continue;
    }
    if (ch === '"' || ch === "'" || ch === '`') {
      quote = ch;
    } else if (ch in OPENERS) {
      depth++;
    } else if (CLOSERS.has(ch)) {
      depth--;
    } else if (ch === '=' && depth === 0) {
      const next = entry.charAt(i + 1);
      const prev = entry.charAt(i - 1);
      if (next !== '>' && next !== '=' && prev !== '=' && prev !== '!') {
        return i;
      }
    }
  }
  return -1;
}

function unquote(text: string): string | undefined {
  const first = text.charAt(0);
  const last = text.charAt(text.length - 1);
  if (text.length < 2 || first !== last) {
    return undefined;
  }
  if (first === '"') {
    try {
      const value: unknown = JSON.parse(text);
      return typeof value === 'string' ? value : undefined;
    } catch {
      return undefined;
    }
  }
  if (first === "'" || first === '`') {
    const inner = text.slice(1, -1);
    if (inner.includes('\\') || inner.includes(first) || (first === '`' && inner.includes('${'))) {
      return undefined;
    }
    return inner;
  }
  return undefined;
}

function isLiteralValue(value: unknown): value is LiteralValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return true;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value);
  }
  if (Array.isArray(value)) {
    return value.every(isLiteralValue);
  }
  if (typeof value === 'object') {
    return Object.values(value).every(isLiteralValue);
  }
  return false;
}

/**
 * Evaluate a default-value expression when it is a plain literal.
 */
export function parseLiteral(source: string): { value: LiteralValue } | undefined {
  const text = source.trim();
  if (text === 'true') return { value: true };
  if (text === 'false') return { value: false };
  if (text === 'null') return { value: null };
  if (/^-?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i.test(text)) {
    return { value: Number(text) };
  }

  const str = unquote(text);
  if (str !== undefined) {
    return { value: str };
  }

  if (text.startsWith('[') || text.startsWith('{')) {
    try {
      const value: unknown = JSON.parse(text);
      return isLiteralValue(value) ? { value } : undefined;
    } catch {
      return undefined;
    }
  }
  return undefined;
}

function readPatternEntry(entry: string): SignatureParameter | undefined {
  const eq = findDefaultSeparator(entry);
  const target = eq === -1 ? entry : entry.slice(0, eq).trim();
  const defaultSource = eq === -1 ? undefined : entry.slice(eq + 1).trim();

  // `key: alias` renames locally; the argument key is what callers send.
  const [rawKey] = splitTopLevel(target, ':');
  if (rawKey === undefined) {
    return undefined;
  }
  const key = IDENTIFIER.test(rawKey) ? rawKey : unquote(rawKey);
  if (key === undefined || key === '') {
    return undefined;
  }

  if (defaultSource === undefined) {
    return { name: key, kind: 'required' };
  }
  if (defaultSource === 'undefined') {
    return { name: key, kind: 'optional' };
  }
  const literal = parseLiteral(defaultSource);
  return literal
    ? { name: key, kind: 'literal-default', defaultValue: literal.value }
    : { name: key, kind: 'optional' };
}

/**
 * Locate the parameter list of a function's source text.
 */
function parameterListOf(source: string): string | undefined {
  const paren = source.indexOf('(');
  const arrow = source.indexOf('=>');
  if (paren === -1 || (arrow !== -1 && arrow < paren)) {
    // `x => ...`: a bare single parameter
    const bare = source.slice(0, arrow === -1 ? undefined : arrow).replace(/^async\s+/, '').trim();
    return IDENTIFIER.test(bare) ? bare : undefined;
  }
  const close = findClosing(source, paren);
  return close === -1 ? undefined : source.slice(paren + 1, close);
}

/**
 * Read the keyword parameters a function destructures from its argument.
 */
export function readSignature(fn: ToolFunction): SignatureParameter[] | undefined {
  let source: string;
  try {
    source = Function.prototype.toString.call(fn);
  } catch {
    return undefined;
  }
  if (source.includes('[native code]') || source.startsWith('class')) {
    return undefined;
  }

  const list = parameterListOf(source);
  if (list === undefined) {
    return undefined;
  }
  const params = splitTopLevel(list, ',').filter((p) => p !== '');
  const first = params[0];
  if (first === undefined) {
    return [];
  }
  if (!first.startsWith('{')) {
    return undefined;
  }

  const close = findClosing(first, 0);
  if (close === -1) {
    return undefined;
  }

  const result: SignatureParameter[] = [];
  for (const entry of splitTopLevel(first.slice(1, close), ',')) {
    if (entry === '' || entry.startsWith('...')) {
      continue;
    }
    const param = readPatternEntry(entry);
    if (param === undefined) {
      return undefined;
    }
    result.push(param);
  }
  return result;
}
