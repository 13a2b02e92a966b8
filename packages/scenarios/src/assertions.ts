/**
 * Shared assertion helpers for scenario runner tests.
 */
import * as assert from "node:assert/strict";

function typeName(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function findSubsetMismatch(actual: unknown, subset: unknown, path: string): string | null {
  if (Array.isArray(subset)) {
    if (!Array.isArray(actual)) {
      return `${path}: expected array but got ${typeName(actual)}`;
    }
    if (actual.length < subset.length) {
      return `${path}: expected at least ${subset.length} items but got ${actual.length}`;
    }
    for (let i = 0; i < subset.length; i++) {
      const mismatch = findSubsetMismatch(actual[i], subset[i], `${path}[${i}]`);
      if (mismatch) return mismatch;
    }
    return null;
  }

  if (!isRecord(subset)) {
    if (!Object.is(actual, subset)) {
      return `${path}: expected ${JSON.stringify(subset)} but got ${JSON.stringify(actual)}`;
    }
    return null;
  }

  if (!isRecord(actual)) {
    return `${path}: expected object but got ${typeName(actual)}`;
  }
  for (const key of Object.keys(subset)) {
    if (!Object.prototype.hasOwnProperty.call(actual, key)) {
      return `${path}.${key}: key missing`;
    }
    const mismatch = findSubsetMismatch(actual[key], subset[key], `${path}.${key}`);
    if (mismatch) return mismatch;
  }
  return null;
}

/** Passes when every key and array prefix in `subset` matches `actual`. */
export function assertJsonSubset(actual: unknown, subset: unknown, label: string): void {
  const mismatch = findSubsetMismatch(actual, subset, "$");
  if (mismatch) {
    assert.fail(`${label}: JSON subset mismatch at ${mismatch}`);
  }
}
