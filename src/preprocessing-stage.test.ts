import { describe, it, expect, vi } from "vitest";
import type { LoadedAudio } from "./audio-metadata.js";
import { SingleSpeakerDiarizer, type Diarizer } from "./diarizer.js";
import { IntegrityError, NotFoundError } from "./errors.js";
import { EvidenceStore } from "./evidence-store.js";
import { silentLogger } from "./logger.js";
import { PREPROCESSING_PRODUCER, PreprocessingStage, type PreprocessingStageDeps } from "./preprocessing-stage.js";
import { commitChain, makeRawPayload, makeWav } from "./test-helpers.js";

// ─── Test Helpers ─────────────────────────────────────────────────────────────

async function setup(diarizer: Diarizer = new SingleSpeakerDiarizer(), loadAudio?: PreprocessingStageDeps["loadAudio"]) {
  const store = new EvidenceStore({ logger: silentLogger });
  const raw = await store.putAndGet({ version_kind: "Raw", parent_id: null, producer: "test", payload: makeRawPayload() });
  const stage = new PreprocessingStage({
    store,
    diarizer,
    confidenceThreshold: 0.6,
    loadAudio,
    logger: silentLogger,
  });
  return { store, raw, stage };
}

async function errorOf(promise: Promise<unknown>): Promise<unknown> {
  return promise.catch((e: unknown) => e);
}

// ─── Tests ────────────────────────────────────────────────────────────────────

describe("PreprocessingStage.preprocess", () => {
  it("should commit a Preprocessed child of the Raw evidence", async () => {
    const { store, raw, stage } = await setup();

    const pre = await stage.preprocess(raw.id);

    expect(pre.version_kind).toBe("Preprocessed");
    expect(pre.parent_id).toBe(raw.id);
    expect(pre.producer).toBe(PREPROCESSING_PRODUCER);
    expect(pre.payload.raw_evidence_id).toBe(raw.id);
    expect(pre.payload.segments).toEqual([
      {
        index: 0,
        start_ts: 0,
        end_ts: 1,
        speaker_id: "speaker_0",
        speaker_confidence: 1,
        transcript_span: { text: "hello there", word_start: 0, word_end: 2 },
        pause_before: 0,
        pause_level: "SHORT",
      },
    ]);
    expect(pre.payload.speakers).toEqual(["speaker_0"]);
    expect(pre.payload.diarization).toEqual({
      engine: "single-speaker",
      model: null,
      confidence_threshold: 0.6,
      turn_count: 1,
    });
    expect(pre.payload.rules).toEqual({ short_pause_seconds: 0.7, long_pause_seconds: 2, max_segment_seconds: 30 });
    expect(store.size).toBe(2);
  });

  it("should reuse the existing record when run twice on the same Raw", async () => {
    const { store, raw, stage } = await setup();

    const first = await stage.preprocess(raw.id);
    const second = await stage.preprocess(raw.id);

    expect(second.id).toBe(first.id);
    expect(store.size).toBe(2);
  });

  it("should load the captured audio only for diarizers that need it", async () => {
    const audio: LoadedAudio = {
      fileName: "meeting.wav",
      bytes: makeWav(1, 8000, () => 0),
      wav: null,
      ref: makeRawPayload().source_audio,
    };
    const loadAudio = vi.fn().mockResolvedValue(audio);
    const diarize = vi.fn().mockResolvedValue({
      engine: "fake",
      model: "fake-1",
      turns: [
        { start_ts: 0, end_ts: 0.55, speaker_id: "speaker_0", confidence: 0.9 },
        { start_ts: 0.55, end_ts: 1, speaker_id: "speaker_1", confidence: 0.3 },
      ],
    });
    const { raw, stage } = await setup({ requiresAudio: true, diarize }, loadAudio);

    const pre = await stage.preprocess(raw.id);

    expect(loadAudio).toHaveBeenCalledWith(raw.payload.source_audio);
    expect(diarize).toHaveBeenCalledWith({ audio, words: raw.payload.word_timings });
    expect(pre.payload.segments.map((s) => [s.speaker_id, s.transcript_span.text])).toEqual([
      ["speaker_0", "hello"],
      ["unknown", "there"],
    ]);
    expect(pre.payload.unknown_speaker_segments).toEqual([1]);
    expect(pre.payload.speakers).toEqual(["speaker_0"]);
  });

  it("should not touch the audio for a text-only diarizer", async () => {
    const loadAudio = vi.fn();
    const { raw, stage } = await setup(new SingleSpeakerDiarizer(), loadAudio);

    await stage.preprocess(raw.id);
    expect(loadAudio).not.toHaveBeenCalled();
  });

  it("should reject an id that holds a later version kind", async () => {
    const store = new EvidenceStore({ logger: silentLogger });
    const { analyzed } = await commitChain(store);
    const stage = new PreprocessingStage({
      store,
      diarizer: new SingleSpeakerDiarizer(),
      confidenceThreshold: 0.6,
      logger: silentLogger,
    });

    const err = await errorOf(stage.preprocess(analyzed.id));

    expect(err).toBeInstanceOf(NotFoundError);
    if (err instanceof NotFoundError) {
      expect(err.stage).toBe("preprocessing");
      expect(err.evidenceId).toBe(analyzed.id);
      expect(err.expectedKind).toBe("Raw");
      expect(err.actualKind).toBe("Analyzed");
    }
    expect(store.size).toBe(3);
  });

  it("should report an unknown id from the preprocessing stage", async () => {
    const { stage } = await setup();

    const err = await errorOf(stage.preprocess("f".repeat(64)));
    expect(err).toBeInstanceOf(NotFoundError);
    if (err instanceof NotFoundError) {
      expect(err.toReport()).toBe(
        `NotFoundError [stage=preprocessing] [evidence=${"f".repeat(64)}]: Evidence ${"f".repeat(64)} not found`,
      );
    }
  });

  it("should tag segmentation failures with the Raw id and commit nothing", async () => {
    const diarize = vi.fn().mockResolvedValue({
      engine: "fake",
      model: null,
      turns: [{ start_ts: 0, end_ts: 1, speaker_id: "unknown", confidence: 1 }],
    });
    const { store, raw, stage } = await setup({ requiresAudio: false, diarize });

    const err = await errorOf(stage.preprocess(raw.id));

    expect(err).toBeInstanceOf(IntegrityError);
    if (err instanceof IntegrityError) {
      expect(err.stage).toBe("preprocessing");
      expect(err.evidenceId).toBe(raw.id);
    }
    expect(store.size).toBe(1);
  });
});
