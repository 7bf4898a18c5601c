/**
 * Common utility functions shared by the merge table, reconciler and stores.
 */

import { randomUUID } from 'node:crypto';

import type { Period } from './types';

/**
 * Generate a UUID v4 identifier.
 */
export function generateId(): string {
  return randomUUID();
}

/**
 * Current time in whole minutes since the epoch, the resolution record edit
 * stamps are kept at.
 */
export function nowMinutes(): number {
  return Math.floor(Date.now() / 60_000);
}

/**
 * Get the current timestamp as an ISO string.
 */
export function now(): string {
  return new Date().toISOString();
}

/**
 * Canonical string for a period: `2024` for a yearly set, `2024-05` for a
 * monthly one.
 */
export function formatPeriodKey(period: Period): string {
  if (period.month === undefined) return String(period.year);
  return `${period.year}-${String(period.month).padStart(2, '0')}`;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep equality for JSON-like payload values.
 *
 * Object keys whose value is `undefined` count as absent, so a payload that
 * went through a JSON round trip still equals its in-memory original.
 *
 * @example
 * valuesEqual({ a: 1, b: undefined }, { a: 1 }); // true
 * valuesEqual([1, 2], [1, 2]);                   // true
 * valuesEqual(null, undefined);                  // false
 */
export function valuesEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  /* null requires special handling because typeof null === 'object'. */
  if (a === null || b === null) return false;
  if (typeof a !== typeof b) return false;

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b)) return false;
    if (a.length !== b.length) return false;
    return a.every((val, i) => valuesEqual(val, b[i]));
  }

  if (isPlainObject(a) && isPlainObject(b)) {
    const aKeys = Object.keys(a).filter((k) => a[k] !== undefined);
    const bKeys = Object.keys(b).filter((k) => b[k] !== undefined);
    if (aKeys.length !== bKeys.length) return false;
    return aKeys.every((key) => valuesEqual(a[key], b[key]));
  }

  return false;
}

/**
 * JSON encoding with object keys sorted, so equal payloads always encode to
 * the same string.
 */
export function stableStringify(value: unknown): string {
  if (value === undefined) return 'null';
  if (Array.isArray(value)) return `[${value.map(stableStringify).join(',')}]`;
  if (isPlainObject(value)) {
    const entries = Object.keys(value)
      .filter((k) => value[k] !== undefined)
      .sort()
      .map((k) => `${JSON.stringify(k)}:${stableStringify(value[k])}`);
    return `{${entries.join(',')}}`;
  }
  return JSON.stringify(value);
}

/** 32-bit FNV-1a hash of a string. */
export function hashString(input: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}
