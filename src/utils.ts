// Shared utilities for the HSIE Evidence Pipeline.
//
// Deterministic helpers used across stages: canonical serialization and content
// hashing for Evidence addressing, numeric rounding, and bounded async execution.

import { createHash } from "node:crypto";

// ─── Canonical JSON / content addressing ────────────────────────────────────────

/**
 * Recursively sort object keys so that two structurally equal values serialize
 * to the same string regardless of property insertion order.
 * `undefined` object members are dropped, matching JSON.stringify.
 */
export function canonicalize(value: unknown): unknown {
  if (value === null || typeof value !== "object") {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map(canonicalize);
  }

  const sorted: Record<string, unknown> = {};
  for (const key of Object.keys(value).sort()) {
    const member: unknown = Reflect.get(value, key);
    if (member !== undefined) {
      sorted[key] = canonicalize(member);
    }
  }
  return sorted;
}

export function canonicalJson(value: unknown): string {
  return JSON.stringify(canonicalize(value));
}

/** Lowercase hex SHA-256 of the canonical JSON of `value`. */
export function contentHash(value: unknown): string {
  return createHash("sha256").update(canonicalJson(value)).digest("hex");
}

export function sha256Hex(bytes: Uint8Array): string {
  return createHash("sha256").update(bytes).digest("hex");
}

/** Freeze an object graph in place and return it. */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const key of Object.keys(value)) {
      deepFreeze(Reflect.get(value, key));
    }
  }
  return value;
}

// ─── Numbers ────────────────────────────────────────────────────────────────────

/** Round a metric value to the specified number of decimal places. */
export function roundMetric(value: number, precision: number = 6): number {
  const factor = Math.pow(10, precision);
  return Math.round(value * factor) / factor;
}

export function clamp01(value: number): number {
  if (value < 0) return 0;
  if (value > 1) return 1;
  return value;
}

export function isUnitInterval(value: number): boolean {
  return Number.isFinite(value) && value >= 0 && value <= 1;
}

// ─── Async helpers ──────────────────────────────────────────────────────────────

export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Run `fn` with an AbortSignal that fires after `timeoutMs`.
 * Rejects with TimeoutError when the deadline passes first, even if `fn`
 * ignores the signal.
 */
export async function runWithTimeout<T>(
  label: string,
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    return await Promise.race([
      fn(controller.signal),
      new Promise<never>((_resolve, reject) => {
        controller.signal.addEventListener(
          "abort",
          () => reject(new TimeoutError(label, timeoutMs)),
          { once: true },
        );
      }),
    ]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Map `items` through `fn` with at most `limit` calls in flight.
 * Results keep the input order. The first rejection rejects the whole call
 * and no further items are started; calls already in flight run to completion.
 * Callers that need isolation must catch inside `fn`.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const workerCount = Math.max(1, Math.min(Math.floor(limit), items.length));
  let next = 0;
  let failed = false;

  const worker = async (): Promise<void> => {
    while (!failed && next < items.length) {
      const index = next++;
      try {
        results[index] = await fn(items[index], index);
      } catch (err) {
        failed = true;
        throw err;
      }
    }
  };

  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return results;
}
