import { describe, it, expect } from 'vitest';
import { normalizeResult } from './results.js';

class Point {
  constructor(readonly x: number, readonly y: number) {}

  toString(): string {
    return `Point(${this.x}, ${this.y})`;
  }
}

describe('normalizeResult', () => {
  it('passes JSON values through', () => {
    expect(normalizeResult(5)).toBe(5);
    expect(normalizeResult('text')).toBe('text');
    expect(normalizeResult(null)).toBeNull();
    expect(normalizeResult({ a: [1, 'two', { b: false }] })).toEqual({ a: [1, 'two', { b: false }] });
  });

  it('maps undefined to null', () => {
    expect(normalizeResult(undefined)).toBeNull();
  });

  it('follows JSON rules for undefined members', () => {
    expect(normalizeResult({ a: 1, b: undefined })).toEqual({ a: 1 });
    expect(normalizeResult([1, undefined])).toEqual([1, null]);
  });

  it('stringifies values JSON cannot represent', () => {
    expect(normalizeResult(new Point(1, 2))).toBe('Point(1, 2)');
    expect(normalizeResult(10n)).toBe('10');
    expect(normalizeResult(Number.POSITIVE_INFINITY)).toBe('Infinity');
  });

  it('inspects containers without a string form of their own', () => {
    expect(normalizeResult(new Map([['k', 1]]))).toBe("Map(1) { 'k' => 1 }");
    expect(normalizeResult({ nested: new Point(0, 0) })).toBe('{ nested: Point { x: 0, y: 0 } }');
    expect(normalizeResult(function lookup() {})).toBe('[Function: lookup]');
  });

  it('stringifies cyclic structures', () => {
    const cyclic: Record<string, unknown> = { name: 'loop' };
    cyclic.self = cyclic;
    expect(normalizeResult(cyclic)).toBe("<ref *1> { name: 'loop', self: [Circular *1] }");
  });

  it('accepts shared references that are not cycles', () => {
    const shared = { v: 1 };
    expect(normalizeResult({ a: shared, b: shared })).toEqual({ a: { v: 1 }, b: { v: 1 } });
  });
});
