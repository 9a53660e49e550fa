// Property-Based Tests for content addressing in the Evidence Store

import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import { computeEvidenceId, EvidenceStore } from "./evidence-store.js";
import { silentLogger } from "./logger.js";
import { makeRawPayload } from "./test-helpers.js";
import type { WordTiming } from "./types.js";

// ─── Generators ─────────────────────────────────────────────────────────────────

const arbitraryWords: fc.Arbitrary<WordTiming[]> = fc
  .array(
    fc.record({
      word: fc.string({ minLength: 1, maxLength: 12 }),
      duration: fc.double({ min: 0.05, max: 2, noNaN: true }),
      gap: fc.double({ min: 0, max: 3, noNaN: true }),
    }),
    { minLength: 1, maxLength: 20 },
  )
  .map((items) => {
    let t = 0;
    return items.map(({ word, duration, gap }) => {
      const start = t + gap;
      t = start + duration;
      return { word, start_ts: start, end_ts: t, confidence: null };
    });
  });

/** Rebuild an object with its keys in reverse insertion order, recursively. */
function reverseKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(reverseKeys);
  if (value === null || typeof value !== "object") return value;
  const out: Record<string, unknown> = {};
  for (const key of Object.keys(value).reverse()) {
    out[key] = reverseKeys(Reflect.get(value, key));
  }
  return out;
}

// ─── Properties ─────────────────────────────────────────────────────────────────

describe("Evidence Store content addressing", () => {
  it("id does not depend on key order, producer or clock", async () => {
    await fc.assert(
      fc.asyncProperty(
        arbitraryWords,
        fc.string({ minLength: 1 }),
        fc.string({ minLength: 1 }),
        fc.date({ min: new Date("2020-01-01"), max: new Date("2030-01-01") }),
        async (timings, producerA, producerB, when) => {
          const payload = makeRawPayload({ word_timings: timings });
          const storeA = new EvidenceStore({ logger: silentLogger });
          const storeB = new EvidenceStore({ logger: silentLogger, now: () => when });

          const idA = await storeA.put({ version_kind: "Raw", parent_id: null, producer: producerA, payload });
          const idB = await storeB.put({
            version_kind: "Raw",
            parent_id: null,
            producer: producerB,
            payload: makeRawPayload({ word_timings: timings }),
          });

          expect(idA).toBe(idB);
          expect(computeEvidenceId({ version_kind: "Raw", parent_id: null, payload: reverseKeys(payload) })).toBe(idA);
        },
      ),
      { numRuns: 50 },
    );
  });

  it("repeated puts of the same content never grow the store", async () => {
    await fc.assert(
      fc.asyncProperty(arbitraryWords, fc.integer({ min: 1, max: 5 }), async (timings, repeats) => {
        const store = new EvidenceStore({ logger: silentLogger });
        const ids = new Set<string>();
        for (let i = 0; i < repeats; i++) {
          ids.add(
            await store.put({
              version_kind: "Raw",
              parent_id: null,
              producer: `producer-${i}`,
              payload: makeRawPayload({ word_timings: timings }),
            }),
          );
        }
        expect(ids.size).toBe(1);
        expect(store.size).toBe(1);
      }),
      { numRuns: 50 },
    );
  });

  it("reads return exactly what was written", async () => {
    await fc.assert(
      fc.asyncProperty(arbitraryWords, async (timings) => {
        const store = new EvidenceStore({ logger: silentLogger });
        const payload = makeRawPayload({ word_timings: timings });
        const evidence = await store.putAndGet({ version_kind: "Raw", parent_id: null, producer: "p", payload });
        expect(evidence.payload.word_timings).toEqual(timings);
      }),
      { numRuns: 50 },
    );
  });
});
