// Shared fixtures for the test suites. Excluded from the build.

import type { EvidenceStore } from "./evidence-store.js";
import type {
  AnalysisOutcome,
  AnalyzedEvidence,
  AnalyzedPayload,
  AnalyzerKind,
  PreprocessedEvidence,
  PreprocessedPayload,
  RawEvidence,
  RawPayload,
  Segment,
  SegmentAnalysis,
  WordTiming,
} from "./types.js";

export const FIXED_DATE = new Date("2025-03-04T09:15:30.000Z");

export const SAMPLE_SHA = "a".repeat(64);

/** `[word, start, end]` triples → word timings without confidence. */
export function words(...triples: Array<[string, number, number]>): WordTiming[] {
  return triples.map(([word, start_ts, end_ts]) => ({ word, start_ts, end_ts, confidence: null }));
}

export function makeRawPayload(overrides: Partial<RawPayload> = {}): RawPayload {
  const timings = overrides.word_timings ?? words(["hello", 0, 0.5], ["there", 0.6, 1.0]);
  return {
    transcript: timings.map((w) => w.word).join(" "),
    language: "en",
    word_timings: timings,
    asr_chunks: [
      {
        index: 0,
        start_ts: timings[0]?.start_ts ?? 0,
        end_ts: timings[timings.length - 1]?.end_ts ?? 0,
        text: timings.map((w) => w.word).join(" "),
        word_start: 0,
        word_end: timings.length,
      },
    ],
    timing_precision: "word",
    overall_confidence: 0.9,
    source_audio: {
      uri: "file:///recordings/meeting.wav",
      sha256: SAMPLE_SHA,
      byte_length: 1024,
      format: "wav",
      duration_seconds: 1,
      sample_rate: 16000,
      channels: "mono",
    },
    capture: {
      capture_id: "capture-1",
      session_id: null,
      captured_at: FIXED_DATE.toISOString(),
      engine: "openai",
      model: "whisper-1",
    },
    ...overrides,
  };
}

export function makeSegment(
  index: number,
  speaker: string,
  start: number,
  end: number,
  text: string,
  wordStart: number,
  wordEnd: number,
): Segment {
  return {
    index,
    start_ts: start,
    end_ts: end,
    speaker_id: speaker,
    speaker_confidence: speaker === "unknown" ? 0.4 : 0.9,
    transcript_span: { text, word_start: wordStart, word_end: wordEnd },
    pause_before: 0,
    pause_level: "SHORT",
  };
}

export function makePreprocessedPayload(rawId: string, segments: Segment[]): PreprocessedPayload {
  return {
    raw_evidence_id: rawId,
    source_time_range:
      segments.length > 0 ? { start_ts: segments[0].start_ts, end_ts: segments[segments.length - 1].end_ts } : null,
    segments,
    discarded: [],
    speakers: [...new Set(segments.map((s) => s.speaker_id).filter((s) => s !== "unknown"))].sort(),
    unknown_speaker_segments: segments.filter((s) => s.speaker_id === "unknown").map((s) => s.index),
    diarization: { engine: "single-speaker", model: null, confidence_threshold: 0.6, turn_count: 1 },
    rules: { short_pause_seconds: 0.7, long_pause_seconds: 2, max_segment_seconds: 30 },
  };
}

export function scored(value: number, confidence: number, version = "test@1"): AnalysisOutcome {
  return { status: "scored", value, confidence, analyzer_version: version };
}

export function failed(version = "test@1"): AnalysisOutcome {
  return {
    status: "failed",
    error_kind: "PartialAnalysisError",
    reason: "analyzer_error",
    message: "analyzer exploded",
    analyzer_version: version,
  };
}

export function segmentAnalysis(
  index: number,
  speaker: string,
  results: Partial<Record<AnalyzerKind, AnalysisOutcome>>,
): SegmentAnalysis {
  return { segment_index: index, speaker_id: speaker, start_ts: index * 2, end_ts: index * 2 + 1, results };
}

export function makeAnalyzedPayload(preprocessedId: string, segments: SegmentAnalysis[]): AnalyzedPayload {
  const kinds = new Set<AnalyzerKind>();
  for (const s of segments) {
    for (const kind of ["Acoustic", "Semantic", "Linguistic"] as const) {
      if (s.results[kind]) kinds.add(kind);
    }
  }
  return {
    preprocessed_evidence_id: preprocessedId,
    analyzer_set: [...kinds].map((kind) => ({ kind, version: "test@1" })),
    segments,
    failure_count: segments.reduce(
      (n, s) => n + Object.values(s.results).filter((o) => o?.status === "failed").length,
      0,
    ),
  };
}

/** Commit a Raw → Preprocessed → Analyzed chain directly through the store. */
export async function commitChain(
  store: EvidenceStore,
  analyses?: SegmentAnalysis[],
): Promise<{ raw: RawEvidence; preprocessed: PreprocessedEvidence; analyzed: AnalyzedEvidence }> {
  const raw = await store.putAndGet({
    version_kind: "Raw",
    parent_id: null,
    producer: "test",
    payload: makeRawPayload(),
  });
  const preprocessed = await store.putAndGet({
    version_kind: "Preprocessed",
    parent_id: raw.id,
    producer: "test",
    payload: makePreprocessedPayload(raw.id, [makeSegment(0, "speaker_0", 0, 1, "hello there", 0, 2)]),
  });
  const analyzed = await store.putAndGet({
    version_kind: "Analyzed",
    parent_id: preprocessed.id,
    producer: "test",
    payload: makeAnalyzedPayload(
      preprocessed.id,
      analyses ?? [segmentAnalysis(0, "speaker_0", { Semantic: scored(0.8, 1), Linguistic: scored(0.2, 1) })],
    ),
  });
  return { raw, preprocessed, analyzed };
}

/**
 * A 16-bit PCM mono WAV file. `amplitude(t)` gives the constant sample value
 * for the second containing t.
 */
export function makeWav(seconds: number, sampleRate: number, amplitude: (second: number) => number): Buffer {
  const frames = Math.round(seconds * sampleRate);
  const data = Buffer.alloc(frames * 2);
  for (let i = 0; i < frames; i++) {
    data.writeInt16LE(amplitude(Math.floor(i / sampleRate)), i * 2);
  }
  const header = Buffer.alloc(44);
  header.write("RIFF", 0, "ascii");
  header.writeUInt32LE(36 + data.length, 4);
  header.write("WAVE", 8, "ascii");
  header.write("fmt ", 12, "ascii");
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20); // PCM
  header.writeUInt16LE(1, 22); // mono
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE(sampleRate * 2, 28);
  header.writeUInt16LE(2, 32);
  header.writeUInt16LE(16, 34);
  header.write("data", 36, "ascii");
  header.writeUInt32LE(data.length, 40);
  return Buffer.concat([header, data]);
}
