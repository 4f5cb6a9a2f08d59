import lodash from "lodash";
import type { JsonValue } from "./models.js";

const { isPlainObject } = lodash;

/**
 * Sleep for `ms` milliseconds. Resolves early when `signal` aborts.
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, Math.max(0, ms));
    signal?.addEventListener("abort", done, { once: true });
  });
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return isPlainObject(value);
}

/**
 * Copy an untyped value as JSON. Non-finite numbers and values JSON cannot
 * represent become null.
 */
export function toJsonValue(raw: unknown): JsonValue {
  if (raw === null || typeof raw === "string" || typeof raw === "boolean") {
    return raw;
  }
  if (typeof raw === "number") {
    return Number.isFinite(raw) ? raw : null;
  }
  if (Array.isArray(raw)) {
    return raw.map(toJsonValue);
  }
  if (isRecord(raw)) {
    const result: { [key: string]: JsonValue } = {};
    for (const [key, value] of Object.entries(raw)) {
      result[key] = toJsonValue(value);
    }
    return result;
  }
  return null;
}

function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(canonicalize);
  }
  if (isRecord(value)) {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = canonicalize(value[key]);
    }
    return sorted;
  }
  return value;
}

/**
 * Serialize to compact JSON with object keys sorted at every depth.
 * Equal key/value sets always produce the same string, whatever their insertion order.
 */
export function encodeCanonical(value: unknown): string {
  return JSON.stringify(canonicalize(value));
}

/**
 * Lowercase and replace everything outside [a-z0-9_] with "_".
 * "main.switchLevel.level" -> "main_switchlevel_level"
 */
export function sanitizeId(value: string): string {
  return value.toLowerCase().replace(/[^a-z0-9_]/g, "_");
}

/**
 * Own-property lookup, so keys such as "constructor" never hit the prototype.
 */
export function lookup<T>(table: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.hasOwn(table, key) ? table[key] : undefined;
}
