/**
 * Tests for deterministic content tokens
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { tokenize, normalizeToken, hashString, isTokenizable } from '../tokenize.js';
import { ValidationError } from '../errors.js';

describe('normalizeToken', () => {
  it('should tag primitives by type', () => {
    expect(normalizeToken(1)).toBe('d:1');
    expect(normalizeToken('1')).toBe('s:"1"');
    expect(normalizeToken(true)).toBe('T');
    expect(normalizeToken(null)).toBe('n');
    expect(normalizeToken(undefined)).toBe('u');
    expect(normalizeToken(-0)).toBe('d:-0');
  });

  it('should sort plain object keys', () => {
    expect(normalizeToken({ b: 1, a: 2 })).toBe(normalizeToken({ a: 2, b: 1 }));
    expect(normalizeToken({ a: 1 })).toBe('{"a":d:1}');
  });

  it('should keep array order', () => {
    expect(normalizeToken(['a', 'b'])).toBe('[s:"a",s:"b"]');
    expect(normalizeToken(['a', 'b'])).not.toBe(normalizeToken(['b', 'a']));
  });

  it('should use toToken when available', () => {
    const source = { toToken: () => 'dataset:events' };
    expect(isTokenizable(source)).toBe(true);
    expect(normalizeToken(source)).toBe('t:dataset:events');
  });

  it('should identify functions by object, not by source', () => {
    const scaler = (k: number) => (v: number) => v * k;
    const twice = scaler(2);
    const thrice = scaler(3);
    expect(twice.toString()).toBe(thrice.toString());
    expect(normalizeToken(twice)).toBe(normalizeToken(twice));
    expect(normalizeToken(twice)).not.toBe(normalizeToken(thrice));
    expect(tokenize('apply', twice)).not.toBe(tokenize('apply', thrice));
  });

  it('should keep the function name in its token', () => {
    function double(x: number): number {
      return x * 2;
    }
    expect(normalizeToken(double)).toMatch(/^f:double:\d+$/);
  });

  it('should reject self-referencing values', () => {
    const cyclic: unknown[] = [];
    cyclic.push(cyclic);
    expect(() => normalizeToken(cyclic)).toThrow(ValidationError);
  });

  it('should allow shared (non-cyclic) references', () => {
    const shared = { a: 1 };
    expect(normalizeToken([shared, shared])).toBe('[{"a":d:1},{"a":d:1}]');
  });
});

describe('tokenize', () => {
  it('should produce 16 hex characters', () => {
    expect(tokenize('projection', ['a'])).toMatch(/^[0-9a-f]{16}$/);
  });

  it('should be deterministic', () => {
    fc.assert(
      fc.property(fc.jsonValue(), (value) => {
        expect(tokenize(value)).toBe(tokenize(JSON.parse(JSON.stringify(value))));
      })
    );
  });

  it('should distinguish different operand sequences', () => {
    fc.assert(
      fc.property(fc.array(fc.integer()), fc.array(fc.integer()), (a, b) => {
        fc.pre(JSON.stringify(a) !== JSON.stringify(b));
        expect(tokenize(...a)).not.toBe(tokenize(...b));
      })
    );
  });
});

describe('hashString', () => {
  it('should return unsigned 32-bit integers that depend on the seed', () => {
    const h = hashString('partition-key');
    expect(Number.isInteger(h)).toBe(true);
    expect(h).toBeGreaterThanOrEqual(0);
    expect(h).toBeLessThan(2 ** 32);
    expect(hashString('partition-key', 7)).not.toBe(h);
  });
});
