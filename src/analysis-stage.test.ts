import { describe, it, expect, vi } from "vitest";
import { ANALYSIS_PRODUCER, AnalysisStage, type AnalysisStageDeps } from "./analysis-stage.js";
import { AnalyzerRegistry, type Analyzer, type AnalyzerInput, type AnalyzerScore } from "./analyzers.js";
import type { LoadedAudio } from "./audio-metadata.js";
import { ConfigurationError, IntegrityError, NotFoundError, TranscriptionError } from "./errors.js";
import { EvidenceStore } from "./evidence-store.js";
import { silentLogger } from "./logger.js";
import { makePreprocessedPayload, makeRawPayload, makeSegment, makeWav, scored } from "./test-helpers.js";
import type { AnalyzerKind } from "./types.js";

// ─── Test Helpers ─────────────────────────────────────────────────────────────

function analyzer(
  kind: AnalyzerKind,
  version: string,
  score: (input: AnalyzerInput, signal: AbortSignal) => Promise<AnalyzerScore>,
  requiresAudio = false,
): Analyzer {
  return { kind, version, requiresAudio, score };
}

async function setup(
  analyzers: Analyzer[],
  deps: Partial<AnalysisStageDeps> = {},
  segments = [makeSegment(0, "speaker_0", 0, 0.5, "hello", 0, 1), makeSegment(1, "speaker_1", 0.6, 1, "there", 1, 2)],
) {
  const store = new EvidenceStore({ logger: silentLogger });
  const raw = await store.putAndGet({ version_kind: "Raw", parent_id: null, producer: "test", payload: makeRawPayload() });
  const preprocessed = await store.putAndGet({
    version_kind: "Preprocessed",
    parent_id: raw.id,
    producer: "test",
    payload: makePreprocessedPayload(raw.id, segments),
  });
  const registry = new AnalyzerRegistry();
  analyzers.forEach((a) => registry.register(a));
  const stage = new AnalysisStage({ store, registry, logger: silentLogger, ...deps });
  return { store, raw, preprocessed, stage };
}

const judge = analyzer("Semantic", "judge@1", async (input) => ({
  value: input.segment.index === 0 ? 0.25 : 0.75,
  confidence: 1,
}));

const lexicon = analyzer("Linguistic", "lex@1", async (input) => {
  if (input.segment.index === 1) throw new Error("boom");
  return { value: 0.1, confidence: 0.5 };
});

async function errorOf(promise: Promise<unknown>): Promise<unknown> {
  return promise.catch((e: unknown) => e);
}

// ─── Tests ────────────────────────────────────────────────────────────────────

describe("AnalysisStage.analyze", () => {
  it("should record every pair and keep a failed pair from touching the others", async () => {
    const { preprocessed, stage } = await setup([judge, lexicon]);

    const analyzed = await stage.analyze(preprocessed.id, { kinds: ["Semantic", "Linguistic"] });

    expect(analyzed.version_kind).toBe("Analyzed");
    expect(analyzed.parent_id).toBe(preprocessed.id);
    expect(analyzed.producer).toBe(ANALYSIS_PRODUCER);
    expect(analyzed.payload.analyzer_set).toEqual([
      { kind: "Semantic", version: "judge@1" },
      { kind: "Linguistic", version: "lex@1" },
    ]);
    expect(analyzed.payload.segments).toEqual([
      {
        segment_index: 0,
        speaker_id: "speaker_0",
        start_ts: 0,
        end_ts: 0.5,
        results: { Semantic: scored(0.25, 1, "judge@1"), Linguistic: scored(0.1, 0.5, "lex@1") },
      },
      {
        segment_index: 1,
        speaker_id: "speaker_1",
        start_ts: 0.6,
        end_ts: 1,
        results: {
          Semantic: scored(0.75, 1, "judge@1"),
          Linguistic: {
            status: "failed",
            error_kind: "PartialAnalysisError",
            reason: "analyzer_error",
            message: "Linguistic analyzer on segment 1: boom",
            analyzer_version: "lex@1",
          },
        },
      },
    ]);
    expect(analyzed.payload.failure_count).toBe(1);
  });

  it("should leave unselected dimensions out of the results", async () => {
    const { preprocessed, stage } = await setup([judge, lexicon]);

    const analyzed = await stage.analyze(preprocessed.id, { kinds: ["Semantic"] });

    for (const segment of analyzed.payload.segments) {
      expect(Object.keys(segment.results)).toEqual(["Semantic"]);
    }
  });

  it("should hand each analyzer its neighbours and the Raw context", async () => {
    const score = vi.fn().mockResolvedValue({ value: 0, confidence: 1 });
    const { raw, preprocessed, stage } = await setup([analyzer("Semantic", "judge@1", score)]);

    await stage.analyze(preprocessed.id, { kinds: ["Semantic"] });

    expect(score).toHaveBeenCalledTimes(2);
    expect(score).toHaveBeenCalledWith(
      expect.objectContaining({
        segment: preprocessed.payload.segments[1],
        previous: preprocessed.payload.segments[0],
        next: null,
        language: "en",
        words: raw.payload.word_timings,
        audio: null,
      }),
      expect.any(AbortSignal),
    );
  });

  it("should record a slow analyzer as a timeout", async () => {
    const slow = analyzer("Semantic", "judge@1", () => new Promise<AnalyzerScore>(() => {}));
    const { preprocessed, stage } = await setup([slow], { analyzerTimeoutMs: 10 });

    const analyzed = await stage.analyze(preprocessed.id, { kinds: ["Semantic"] });

    expect(analyzed.payload.segments[0].results.Semantic).toEqual({
      status: "failed",
      error_kind: "PartialAnalysisError",
      reason: "timeout",
      message: "Semantic analyzer on segment 0 timed out after 10ms",
      analyzer_version: "judge@1",
    });
    expect(analyzed.payload.failure_count).toBe(2);
  });

  it("should record out-of-range scores as invalid", async () => {
    const wild = analyzer("Semantic", "judge@1", async () => ({ value: 1.4, confidence: 0.9 }));
    const { preprocessed, stage } = await setup([wild]);

    const analyzed = await stage.analyze(preprocessed.id, { kinds: ["Semantic"] });

    expect(analyzed.payload.segments[0].results.Semantic).toMatchObject({
      status: "failed",
      reason: "invalid_score",
      message: "Semantic analyzer on segment 0: score out of range (value=1.4, confidence=0.9)",
    });
  });

  it("should fail only the audio analyzers when the recording is gone", async () => {
    const acoustic = analyzer("Acoustic", "energy@1", async () => ({ value: 0.5, confidence: 1 }), true);
    const loadAudio = vi.fn().mockRejectedValue(
      new TranscriptionError("audio_unreadable", "Cannot read audio", { stage: "store", evidenceId: null }),
    );
    const { preprocessed, stage } = await setup([acoustic, judge], { loadAudio });

    const analyzed = await stage.analyze(preprocessed.id, { kinds: ["Acoustic", "Semantic"] });

    expect(loadAudio).toHaveBeenCalledTimes(1);
    expect(analyzed.payload.segments[0].results).toEqual({
      Acoustic: {
        status: "failed",
        error_kind: "PartialAnalysisError",
        reason: "analyzer_error",
        message: "Acoustic analyzer on segment 0: source audio is unavailable",
        analyzer_version: "energy@1",
      },
      Semantic: scored(0.25, 1, "judge@1"),
    });
    expect(analyzed.payload.failure_count).toBe(2);
  });

  it("should pass loaded audio to the analyzers that need it", async () => {
    const audio: LoadedAudio = {
      fileName: "meeting.wav",
      bytes: makeWav(1, 8000, () => 0),
      wav: null,
      ref: makeRawPayload().source_audio,
    };
    const score = vi.fn().mockResolvedValue({ value: 0.5, confidence: 1 });
    const { preprocessed, stage } = await setup([analyzer("Acoustic", "energy@1", score, true)], {
      loadAudio: vi.fn().mockResolvedValue(audio),
    });

    await stage.analyze(preprocessed.id, { kinds: ["Acoustic"] });
    expect(score).toHaveBeenCalledWith(expect.objectContaining({ audio }), expect.any(AbortSignal));
  });

  it("should abort when the recording changed since capture", async () => {
    const acoustic = analyzer("Acoustic", "energy@1", async () => ({ value: 0.5, confidence: 1 }), true);
    const loadAudio = vi
      .fn()
      .mockRejectedValue(new IntegrityError("Source audio changed since capture", { stage: "store", evidenceId: null }));
    const { store, preprocessed, stage } = await setup([acoustic], { loadAudio });

    const err = await errorOf(stage.analyze(preprocessed.id, { kinds: ["Acoustic"] }));

    expect(err).toBeInstanceOf(IntegrityError);
    if (err instanceof IntegrityError) {
      expect(err.stage).toBe("analysis");
      expect(err.evidenceId).toBe(preprocessed.id);
    }
    expect(store.size).toBe(2);
  });

  it("should abort on a misconfigured analyzer instead of recording a failure", async () => {
    const broken = analyzer("Semantic", "judge@1", async () => {
      throw new ConfigurationError("OPENAI_API_KEY is not set.");
    });
    const { store, preprocessed, stage } = await setup([broken]);

    await expect(stage.analyze(preprocessed.id, { kinds: ["Semantic"] })).rejects.toBeInstanceOf(ConfigurationError);
    expect(store.size).toBe(2);
  });

  it("should stop starting segments once a fatal error aborts the stage", async () => {
    const score = vi.fn(async (input: AnalyzerInput): Promise<AnalyzerScore> => {
      if (input.segment.index === 0) throw new ConfigurationError("OPENAI_API_KEY is not set.");
      await new Promise((r) => setTimeout(r, 20));
      return { value: 0.5, confidence: 1 };
    });
    const segments = Array.from({ length: 6 }, (_, i) =>
      makeSegment(i, "speaker_0", i, i + 0.5, `word${i}`, i, i + 1),
    );
    const { preprocessed, stage } = await setup([analyzer("Semantic", "judge@1", score)], { maxConcurrency: 2 }, segments);

    await expect(stage.analyze(preprocessed.id, { kinds: ["Semantic"] })).rejects.toBeInstanceOf(ConfigurationError);
    await new Promise((r) => setTimeout(r, 100));

    expect(score.mock.calls.map(([input]) => input.segment.index)).toEqual([0, 1]);
  });

  it("should reject a selection naming an unregistered analyzer", async () => {
    const { preprocessed, stage } = await setup([judge]);

    await expect(stage.analyze(preprocessed.id, { kinds: ["Semantic", "Acoustic"] })).rejects.toThrow(
      "No Acoustic analyzer (available: none)",
    );
  });

  it("should reject an id that is not Preprocessed", async () => {
    const { raw, stage } = await setup([judge]);

    const err = await errorOf(stage.analyze(raw.id, { kinds: ["Semantic"] }));

    expect(err).toBeInstanceOf(NotFoundError);
    if (err instanceof NotFoundError) {
      expect(err.stage).toBe("analysis");
      expect(err.expectedKind).toBe("Preprocessed");
      expect(err.actualKind).toBe("Raw");
    }
  });
});
