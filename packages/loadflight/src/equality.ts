/**
 * Equality utilities for comparing values.
 */

import isEqual from "lodash/isEqual";
import type { Equality } from "./types";

/**
 * Strict equality (Object.is).
 */
export function strictEqual<T>(a: T, b: T): boolean {
  return Object.is(a, b);
}

/**
 * Shallow equality for objects/arrays.
 * Compares by reference for each top-level key/index.
 */
export function shallowEqual<T>(a: T, b: T): boolean {
  if (Object.is(a, b)) return true;
  if (typeof a !== "object" || a === null) return false;
  if (typeof b !== "object" || b === null) return false;

  const keysA = Object.keys(a);
  const keysB = Object.keys(b);

  if (keysA.length !== keysB.length) return false;

  for (const key of keysA) {
    if (!Object.prototype.hasOwnProperty.call(b, key)) return false;
    if (!Object.is(Reflect.get(a, key), Reflect.get(b, key))) return false;
  }

  return true;
}

/**
 * Deep equality.
 */
export function deepEqual<T>(a: T, b: T): boolean {
  return isEqual(a, b);
}

/**
 * Resolve equality strategy to a function.
 */
export function resolveEquality<T>(
  e: Equality<T> | undefined
): (a: T, b: T) => boolean {
  if (!e || e === "strict") return strictEqual;
  if (e === "shallow") return shallowEqual;
  if (e === "deep") return deepEqual;
  return e;
}
