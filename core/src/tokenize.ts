/**
 * Deterministic content tokens
 *
 * `tokenize(...values)` reduces any operand sequence to a short hex digest.
 * Equal inputs always give equal tokens, across runs and processes, which is
 * what lets expression names double as identities. Functions are the
 * exception: two closures over the same source may capture different values,
 * so each function object gets its own token for the life of the process.
 *
 * @example
 * ```typescript
 * tokenize('projection', ['a', 'b']) === tokenize('projection', ['a', 'b']); // true
 * tokenize(1) === tokenize('1'); // false: strings and numbers are tagged
 * ```
 */

import { ValidationError } from './errors.js';

/**
 * Values that know their own token (frames, datasets, expressions).
 */
export interface Tokenizable {
  toToken(): string;
}

export function isTokenizable(value: unknown): value is Tokenizable {
  return (
    typeof value === 'object' &&
    value !== null &&
    'toToken' in value &&
    typeof value.toToken === 'function'
  );
}

// =============================================================================
// Hashing
// =============================================================================

const PRIME1 = 0x9e3779b1;
const PRIME2 = 0x85ebca77;
const PRIME3 = 0xc2b2ae3d;
const PRIME4 = 0x27d4eb2f;
const PRIME5 = 0x165667b1;

/**
 * xxHash-style 32-bit string hash.
 */
export function hashString(input: string, seed: number = 0): number {
  let h32 = seed + PRIME5;
  let i = 0;
  const len = input.length;

  while (i + 4 <= len) {
    let k = 0;
    for (let j = 0; j < 4; j++) {
      k |= input.charCodeAt(i + j) << (j * 8);
    }
    k = Math.imul(k, PRIME3);
    k = (k << 17) | (k >>> 15);
    k = Math.imul(k, PRIME4);
    h32 ^= k;
    h32 = (h32 << 13) | (h32 >>> 19);
    h32 = Math.imul(h32, PRIME1) + PRIME4;
    i += 4;
  }

  while (i < len) {
    h32 ^= Math.imul(input.charCodeAt(i), PRIME5);
    h32 = (h32 << 11) | (h32 >>> 21);
    h32 = Math.imul(h32, PRIME1);
    i++;
  }

  h32 ^= len;
  h32 ^= h32 >>> 15;
  h32 = Math.imul(h32, PRIME2);
  h32 ^= h32 >>> 13;
  h32 = Math.imul(h32, PRIME3);
  h32 ^= h32 >>> 16;

  return h32 >>> 0;
}

const hex8 = (n: number): string => n.toString(16).padStart(8, '0');

/**
 * 64-bit hex digest built from two seeded 32-bit hashes.
 */
export function digest(input: string): string {
  return hex8(hashString(input, 0)) + hex8(hashString(input, PRIME1));
}

// =============================================================================
// Normalization
// =============================================================================

const functionIds = new WeakMap<object, number>();
let nextFunctionId = 0;

/**
 * Token of one function object: its name and a per-object sequence number.
 */
function functionToken(fn: object & { readonly name: string }): string {
  let id = functionIds.get(fn);
  if (id === undefined) {
    id = nextFunctionId++;
    functionIds.set(fn, id);
  }
  return `f:${fn.name}:${id}`;
}

/**
 * Canonical string form of a value. Plain objects are keyed in sorted order
 * so `{a, b}` and `{b, a}` normalize alike; other class instances must be
 * Tokenizable or are described by constructor name and own fields.
 */
export function normalizeToken(value: unknown, seen: Set<object> = new Set()): string {
  switch (typeof value) {
    case 'undefined':
      return 'u';
    case 'boolean':
      return value ? 'T' : 'F';
    case 'number':
      return Object.is(value, -0) ? 'd:-0' : `d:${value}`;
    case 'bigint':
      return `i:${value}`;
    case 'string':
      return `s:${JSON.stringify(value)}`;
    case 'symbol':
      return `y:${String(value.description)}`;
    case 'function':
      return functionToken(value);
  }

  if (value === null || typeof value !== 'object') return 'n';
  if (isTokenizable(value)) return `t:${value.toToken()}`;
  if (value instanceof Date) return `D:${value.getTime()}`;

  if (seen.has(value)) {
    throw new ValidationError('Cannot tokenize a value that contains itself');
  }
  seen.add(value);
  try {
    if (Array.isArray(value)) {
      return `[${value.map((item) => normalizeToken(item, seen)).join(',')}]`;
    }
    if (value instanceof Map) {
      const entries = [...value.entries()].map(
        ([k, v]) => `${normalizeToken(k, seen)}=>${normalizeToken(v, seen)}`
      );
      return `M{${entries.sort().join(',')}}`;
    }
    if (value instanceof Set) {
      const items = [...value].map((item) => normalizeToken(item, seen));
      return `S{${items.sort().join(',')}}`;
    }
    const proto: unknown = Object.getPrototypeOf(value);
    const tag = proto === Object.prototype || proto === null ? '' : value.constructor.name;
    const fields = Object.keys(value)
      .sort()
      .map((key) => `${JSON.stringify(key)}:${normalizeToken(Reflect.get(value, key), seen)}`);
    return `${tag}{${fields.join(',')}}`;
  } finally {
    seen.delete(value);
  }
}

/**
 * Deterministic hex token for a sequence of values.
 */
export function tokenize(...values: unknown[]): string {
  return digest(normalizeToken(values));
}
