// HSIE Evidence Pipeline - Analyzer contract and registry
//
// An analyzer scores one segment along one dimension. Analyzers are pure with
// respect to the pipeline: they read their input and return a value and a
// confidence, both in [0, 1]. The analysis stage owns timeouts and failure
// recording.

import type { LoadedAudio } from "./audio-metadata.js";
import { ConfigurationError } from "./errors.js";
import { ANALYZER_KINDS, type AnalyzerKind, type AnalyzerRef, type Segment, type WordTiming } from "./types.js";

export interface AnalyzerInput {
  segment: Segment;
  previous: Segment | null;
  next: Segment | null;
  language: string | null;
  /** Raw word timings of the whole recording; the segment's words are `transcript_span`'s range. */
  words: readonly WordTiming[];
  /** Present only when the analyzer declares `requiresAudio`. */
  audio: LoadedAudio | null;
}

export interface AnalyzerScore {
  value: number;
  confidence: number;
}

export interface Analyzer {
  readonly kind: AnalyzerKind;
  readonly version: string;
  readonly requiresAudio: boolean;
  score(input: AnalyzerInput, signal: AbortSignal): Promise<AnalyzerScore>;
}

export interface AnalyzerSelection {
  kinds: readonly AnalyzerKind[];
  versions?: Partial<Record<AnalyzerKind, string>>;
}

export function analyzerRef(analyzer: Analyzer): AnalyzerRef {
  return { kind: analyzer.kind, version: analyzer.version };
}

export class AnalyzerRegistry {
  private readonly byKind = new Map<AnalyzerKind, Analyzer[]>();

  /** The first analyzer registered for a kind is that kind's default. */
  register(analyzer: Analyzer): this {
    const existing = this.byKind.get(analyzer.kind) ?? [];
    if (existing.some((a) => a.version === analyzer.version)) {
      throw new ConfigurationError(`Analyzer ${analyzer.kind}@${analyzer.version} is already registered`);
    }
    this.byKind.set(analyzer.kind, [...existing, analyzer]);
    return this;
  }

  resolve(kind: AnalyzerKind, version?: string): Analyzer {
    const candidates = this.byKind.get(kind) ?? [];
    const found = version === undefined ? candidates[0] : candidates.find((a) => a.version === version);
    if (!found) {
      const available = candidates.map((a) => a.version).join(", ") || "none";
      throw new ConfigurationError(
        `No ${kind} analyzer${version === undefined ? "" : ` with version "${version}"`} (available: ${available})`,
      );
    }
    return found;
  }

  /** Resolve a selection into analyzers, one per kind, in canonical kind order. */
  resolveSelection(selection: AnalyzerSelection): Analyzer[] {
    const requested = new Set(selection.kinds);
    if (requested.size === 0) {
      throw new ConfigurationError("Analyzer selection is empty");
    }
    return ANALYZER_KINDS.filter((kind) => requested.has(kind)).map((kind) =>
      this.resolve(kind, selection.versions?.[kind]),
    );
  }

  list(): AnalyzerRef[] {
    return ANALYZER_KINDS.flatMap((kind) => (this.byKind.get(kind) ?? []).map(analyzerRef));
  }
}
