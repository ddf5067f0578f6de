/**
 * Copies of the values that cross node boundaries: tool inputs, recorded
 * outputs and cache entries. Plain data is deep-copied; anything else
 * (functions, class instances, cyclic values) is passed by reference.
 */

import { isPlainData } from './Fingerprint.js';

export function copyData<T>(value: T): T {
  return isPlainData(value) ? structuredClone(value) : value;
}

/**
 * Field-by-field copy, so one uncopyable field does not leave the others shared
 */
export function copyRecord(record: Readonly<Record<string, unknown>>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(record).map(([key, value]) => [key, copyData(value)]));
}

/**
 * Freeze arrays and plain objects all the way down
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value !== 'object' || value === null || Object.isFrozen(value)) {
    return value;
  }

  const prototype: unknown = Object.getPrototypeOf(value);
  if (!Array.isArray(value) && prototype !== Object.prototype && prototype !== null) {
    return value;
  }

  Object.freeze(value);
  for (const item of Object.values(value)) {
    deepFreeze(item);
  }
  return value;
}

/**
 * Frozen deep copy of plain data; other values are returned as they are
 */
export function frozenCopy<T>(value: T): T {
  return isPlainData(value) ? deepFreeze(structuredClone(value)) : value;
}
