/**
 * Input fingerprints: deterministic hashes of resolved tool inputs.
 *
 * Values are encoded as JSON with sorted object keys. Values JSON has no form
 * for (undefined, NaN, bigint, Date, Map, Set...) become single-key tag
 * objects such as `{"$map": [...]}`, and plain-object keys that start with `$`
 * get one more `$`, so no plain value encodes like a tagged one.
 *
 * Inputs holding functions, symbols, class instances or cycles have no
 * encoding and therefore no fingerprint; such nodes are never cached.
 */

import { createHash } from 'node:crypto';
import type { ToolInput } from '../types/core-types.js';

type Encoded = null | boolean | number | string | Encoded[] | { [key: string]: Encoded };

function isPlainObject(value: object): value is Record<string, unknown> {
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

function escapeKey(key: string): string {
  return key.startsWith('$') ? `$${key}` : key;
}

function byEncoding(a: Encoded, b: Encoded): number {
  const left = JSON.stringify(a);
  const right = JSON.stringify(b);
  return left < right ? -1 : left > right ? 1 : 0;
}

function encodeNumber(value: number): Encoded {
  if (Object.is(value, -0)) return { $number: '-0' };
  return Number.isFinite(value) ? value : { $number: String(value) };
}

function encodeAll(values: Iterable<unknown>, ancestors: Set<object>): Encoded[] | undefined {
  const encoded: Encoded[] = [];
  for (const value of values) {
    const item = encode(value, ancestors);
    if (item === undefined) return undefined;
    encoded.push(item);
  }
  return encoded;
}

function encodeObject(value: object, ancestors: Set<object>): Encoded | undefined {
  if (Array.isArray(value)) {
    return encodeAll(Array.from(value), ancestors);
  }

  if (value instanceof Date) {
    const time = value.getTime();
    return { $date: Number.isNaN(time) ? 'Invalid Date' : value.toISOString() };
  }

  if (value instanceof Map) {
    const entries: Encoded[] = [];
    for (const [key, item] of value) {
      const pair = encodeAll([key, item], ancestors);
      if (pair === undefined) return undefined;
      entries.push(pair);
    }
    return { $map: entries.sort(byEncoding) };
  }

  if (value instanceof Set) {
    const items = encodeAll(value, ancestors);
    return items === undefined ? undefined : { $set: items.sort(byEncoding) };
  }

  if (!isPlainObject(value)) {
    return undefined;
  }

  const entries: Array<[string, Encoded]> = [];
  for (const key of Object.keys(value).sort()) {
    const item = encode(value[key], ancestors);
    if (item === undefined) return undefined;
    entries.push([escapeKey(key), item]);
  }
  return Object.fromEntries(entries);
}

function encode(value: unknown, ancestors: Set<object>): Encoded | undefined {
  switch (typeof value) {
    case 'undefined':
      return { $undefined: true };
    case 'string':
    case 'boolean':
      return value;
    case 'number':
      return encodeNumber(value);
    case 'bigint':
      return { $bigint: value.toString() };
    case 'symbol':
    case 'function':
      return undefined;
  }

  if (typeof value !== 'object' || value === null) {
    return null;
  }

  if (ancestors.has(value)) {
    return undefined;
  }
  ancestors.add(value);
  try {
    return encodeObject(value, ancestors);
  } finally {
    ancestors.delete(value);
  }
}

/**
 * Canonical JSON encoding, equal for equal values regardless of key or
 * insertion order. Undefined when the value has no stable encoding.
 */
export function stableStringify(value: unknown): string | undefined {
  const encoded = encode(value, new Set());
  return encoded === undefined ? undefined : JSON.stringify(encoded);
}

/**
 * Whether `value` is data the engine can encode, and therefore also copy
 * with structuredClone without losing its type
 */
export function isPlainData(value: unknown): boolean {
  return encode(value, new Set()) !== undefined;
}

/**
 * SHA-256 of the tool name and its resolved input, hex encoded; undefined
 * when the input cannot be encoded
 */
export function computeFingerprint(toolId: string, input: ToolInput): string | undefined {
  const encoded = stableStringify(input);
  if (encoded === undefined) {
    return undefined;
  }
  return createHash('sha256').update(toolId).update('\u0000').update(encoded).digest('hex');
}
