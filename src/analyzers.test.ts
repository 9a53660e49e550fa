import { describe, it, expect } from "vitest";
import { AnalyzerRegistry, type Analyzer } from "./analyzers.js";
import { ConfigurationError } from "./errors.js";
import type { AnalyzerKind } from "./types.js";

function fakeAnalyzer(kind: AnalyzerKind, version: string): Analyzer {
  return {
    kind,
    version,
    requiresAudio: false,
    score: async () => ({ value: 0, confidence: 1 }),
  };
}

describe("AnalyzerRegistry", () => {
  it("should treat the first registration of a kind as its default", () => {
    const registry = new AnalyzerRegistry()
      .register(fakeAnalyzer("Semantic", "judge@1"))
      .register(fakeAnalyzer("Semantic", "judge@2"));

    expect(registry.resolve("Semantic").version).toBe("judge@1");
    expect(registry.resolve("Semantic", "judge@2").version).toBe("judge@2");
  });

  it("should refuse a duplicate kind and version", () => {
    const registry = new AnalyzerRegistry().register(fakeAnalyzer("Acoustic", "energy@1"));
    expect(() => registry.register(fakeAnalyzer("Acoustic", "energy@1"))).toThrow(ConfigurationError);
  });

  it("should name the available versions when a lookup fails", () => {
    const registry = new AnalyzerRegistry().register(fakeAnalyzer("Linguistic", "lexicon@1"));

    expect(() => registry.resolve("Linguistic", "lexicon@9")).toThrow(
      'No Linguistic analyzer with version "lexicon@9" (available: lexicon@1)',
    );
    expect(() => registry.resolve("Acoustic")).toThrow("No Acoustic analyzer (available: none)");
  });

  it("should resolve a selection in canonical kind order", () => {
    const registry = new AnalyzerRegistry()
      .register(fakeAnalyzer("Linguistic", "lexicon@1"))
      .register(fakeAnalyzer("Acoustic", "energy@1"))
      .register(fakeAnalyzer("Semantic", "judge@1"))
      .register(fakeAnalyzer("Semantic", "judge@2"));

    const analyzers = registry.resolveSelection({
      kinds: ["Linguistic", "Semantic", "Acoustic"],
      versions: { Semantic: "judge@2" },
    });

    expect(analyzers.map((a) => `${a.kind}@${a.version}`)).toEqual([
      "Acoustic@energy@1",
      "Semantic@judge@2",
      "Linguistic@lexicon@1",
    ]);
    expect(registry.list()).toEqual([
      { kind: "Acoustic", version: "energy@1" },
      { kind: "Semantic", version: "judge@1" },
      { kind: "Semantic", version: "judge@2" },
      { kind: "Linguistic", version: "lexicon@1" },
    ]);
  });

  it("should reject an empty selection", () => {
    expect(() => new AnalyzerRegistry().resolveSelection({ kinds: [] })).toThrow("Analyzer selection is empty");
  });
});
