// HSIE Evidence Pipeline - Transcription Adapter
//
// Wraps the ASR engine behind one call: audio in, transcript with timings out.
// The adapter transcribes only. It never labels speakers, never scores, never
// retries. Every failure surfaces as a TranscriptionError with a reason code.

import type { LoadedAudio } from "./audio-metadata.js";
import { SUPPORTED_AUDIO_FORMATS } from "./audio-metadata.js";
import { isPipelineError, TranscriptionError } from "./errors.js";
import { createLogger, type PipelineLogger } from "./logger.js";
import type { RawChunk, TimingPrecision, WordTiming } from "./types.js";
import { clamp01, roundMetric, runWithTimeout, TimeoutError } from "./utils.js";

export interface TranscriptResult {
  text: string;
  word_timings: WordTiming[];
  chunks: RawChunk[];
  overall_confidence: number | null;
  language: string | null;
  engine: string;
  model: string;
  timing_precision: TimingPrecision;
}

export interface TranscribeOptions {
  language?: string;
}

export interface TranscriptionAdapter {
  transcribe(audio: LoadedAudio, options?: TranscribeOptions): Promise<TranscriptResult>;
}

// ─── OpenAI transcription client interface (for testability / dependency injection) ──

/**
 * Minimal interface for the OpenAI audio transcriptions API surface we use.
 * Mirrors `audio.transcriptions.create(body, options)` of the OpenAI SDK, so a
 * mock client can be injected in tests without importing the SDK.
 */
export interface OpenAITranscriptionClient {
  audio: {
    transcriptions: {
      create(
        params: {
          file: File;
          model: string;
          response_format?: string;
          timestamp_granularities?: Array<"word" | "segment">;
          language?: string;
        },
        options?: { signal?: AbortSignal },
      ): Promise<OpenAITranscriptionResponse>;
    };
  };
}

/**
 * `verbose_json` response. `segments` and `words` are absent for models that
 * only return text.
 */
export interface OpenAITranscriptionResponse {
  text: string;
  duration?: number;
  language?: string;
  segments?: Array<{
    id: number;
    start: number;
    end: number;
    text: string;
    avg_logprob?: number;
    no_speech_prob?: number;
  }>;
  words?: Array<{
    word: string;
    start: number;
    end: number;
  }>;
}

type EngineSegment = NonNullable<OpenAITranscriptionResponse["segments"]>[number];

export interface OpenAITranscriptionAdapterOptions {
  model?: string;
  /** Reject transcripts whose overall confidence is below this. 0 accepts everything. */
  minConfidence?: number;
  timeoutMs?: number;
  logger?: PipelineLogger;
}

const DEFAULT_TIMEOUT_MS = 120_000;

/**
 * whisper-1 with `verbose_json` and word + segment timestamp granularities.
 * Engine segments become the Raw `asr_chunks`; words are assigned to the
 * chunk their midpoint falls in.
 */
export class OpenAITranscriptionAdapter implements TranscriptionAdapter {
  readonly engine = "openai";
  private readonly client: OpenAITranscriptionClient;
  private readonly model: string;
  private readonly minConfidence: number;
  private readonly timeoutMs: number;
  private readonly logger: PipelineLogger;

  constructor(client: OpenAITranscriptionClient, options: OpenAITranscriptionAdapterOptions = {}) {
    this.client = client;
    this.model = options.model ?? "whisper-1";
    this.minConfidence = options.minConfidence ?? 0;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = options.logger ?? createLogger("TranscriptionAdapter");
  }

  async transcribe(audio: LoadedAudio, options: TranscribeOptions = {}): Promise<TranscriptResult> {
    const format = audio.ref.format;
    if (format === null || !SUPPORTED_AUDIO_FORMATS.includes(format)) {
      throw new TranscriptionError(
        "unsupported_format",
        `Audio format "${format ?? "(none)"}" is not supported (expected one of ${SUPPORTED_AUDIO_FORMATS.join(", ")})`,
      );
    }

    const audioFile = new File([new Uint8Array(audio.bytes)], audio.fileName);

    let response: OpenAITranscriptionResponse;
    try {
      response = await runWithTimeout("transcription", this.timeoutMs, (signal) =>
        this.client.audio.transcriptions.create(
          {
            file: audioFile,
            model: this.model,
            response_format: "verbose_json",
            timestamp_granularities: ["word", "segment"],
            ...(options.language ? { language: options.language } : {}),
          },
          { signal },
        ),
      );
    } catch (err) {
      if (isPipelineError(err)) {
        throw err;
      }
      if (err instanceof TimeoutError) {
        throw new TranscriptionError("timeout", err.message, undefined, { cause: err });
      }
      const detail = err instanceof Error ? err.message : String(err);
      throw new TranscriptionError("engine_failure", `Transcription engine failed: ${detail}`, undefined, {
        cause: err,
      });
    }

    const result = this.parseResponse(response, audio.ref.duration_seconds, options.language ?? null);

    if (result.overall_confidence !== null && result.overall_confidence < this.minConfidence) {
      throw new TranscriptionError(
        "low_confidence",
        `Transcript confidence ${result.overall_confidence} is below the minimum ${this.minConfidence}`,
      );
    }

    this.logger.info(
      `Transcribed ${audio.fileName}: ${result.word_timings.length} words, ${result.chunks.length} chunks (${result.timing_precision})`,
    );
    return result;
  }

  /**
   * Three paths, by what the engine returned:
   * 1. word timestamps → used as-is, grouped under the engine segments
   * 2. segments only → words interpolated evenly across each segment
   * 3. text only → one chunk over the whole recording, words interpolated
   */
  parseResponse(
    response: OpenAITranscriptionResponse,
    fallbackDuration: number | null,
    requestedLanguage: string | null,
  ): TranscriptResult {
    const text = (response.text ?? "").trim();
    const segments = (response.segments ?? [])
      .filter((seg) => seg.text.trim().length > 0)
      .sort((a, b) => a.start - b.start);

    const base = {
      text,
      overall_confidence: overallConfidence(segments),
      language: response.language ?? requestedLanguage,
      engine: this.engine,
      model: this.model,
    };

    if (response.words && response.words.length > 0) {
      const words = response.words
        .map((w) => ({ word: w.word.trim(), start_ts: w.start, end_ts: w.end, confidence: null }))
        .sort((a, b) => a.start_ts - b.start_ts);
      return { ...base, word_timings: words, chunks: chunkWords(words, segments), timing_precision: "word" };
    }

    if (segments.length > 0) {
      const words: WordTiming[] = [];
      const chunks: RawChunk[] = segments.map((seg, index) => {
        const wordStart = words.length;
        words.push(...interpolateWords(seg.text, seg.start, seg.end));
        return {
          index,
          start_ts: seg.start,
          end_ts: seg.end,
          text: seg.text.trim(),
          word_start: wordStart,
          word_end: words.length,
        };
      });
      return { ...base, word_timings: words, chunks, timing_precision: "interpolated" };
    }

    if (text.length === 0) {
      return { ...base, word_timings: [], chunks: [], timing_precision: "interpolated" };
    }

    const duration = response.duration ?? fallbackDuration ?? 0;
    const words = interpolateWords(text, 0, duration);
    return {
      ...base,
      word_timings: words,
      chunks: [{ index: 0, start_ts: 0, end_ts: duration, text, word_start: 0, word_end: words.length }],
      timing_precision: "interpolated",
    };
  }
}

/**
 * Duration-weighted mean of exp(avg_logprob) over the engine segments.
 * Null when no segment carries a log-probability.
 */
export function overallConfidence(segments: readonly EngineSegment[]): number | null {
  let weighted = 0;
  let totalDuration = 0;
  let plain = 0;
  let count = 0;

  for (const seg of segments) {
    if (seg.avg_logprob === undefined || !Number.isFinite(seg.avg_logprob)) continue;
    const probability = clamp01(Math.exp(seg.avg_logprob));
    const duration = Math.max(0, seg.end - seg.start);
    weighted += probability * duration;
    totalDuration += duration;
    plain += probability;
    count++;
  }

  if (count === 0) return null;
  return roundMetric(totalDuration > 0 ? weighted / totalDuration : plain / count);
}

/** Spread the whitespace-separated tokens of `text` evenly over [start, end]. */
export function interpolateWords(text: string, start: number, end: number): WordTiming[] {
  const tokens = text.split(/\s+/).filter((t) => t.length > 0);
  if (tokens.length === 0) return [];

  const step = Math.max(0, end - start) / tokens.length;
  return tokens.map((word, i) => ({
    word,
    start_ts: roundMetric(start + i * step),
    end_ts: roundMetric(start + (i + 1) * step),
    confidence: null,
  }));
}

/**
 * Group sorted words into contiguous chunks following the engine segments.
 * A word belongs to the first segment whose end lies past the word's midpoint;
 * words after the last segment join it.
 */
function chunkWords(words: readonly WordTiming[], segments: readonly EngineSegment[]): RawChunk[] {
  if (segments.length === 0) {
    const last = words[words.length - 1];
    return [
      {
        index: 0,
        start_ts: words[0].start_ts,
        end_ts: last.end_ts,
        text: words.map((w) => w.word).join(" "),
        word_start: 0,
        word_end: words.length,
      },
    ];
  }

  const chunks: RawChunk[] = [];
  let cursor = 0;
  segments.forEach((seg, index) => {
    const isLast = index === segments.length - 1;
    const wordStart = cursor;
    while (cursor < words.length && (isLast || (words[cursor].start_ts + words[cursor].end_ts) / 2 < seg.end)) {
      cursor++;
    }
    chunks.push({
      index,
      start_ts: seg.start,
      end_ts: seg.end,
      text: seg.text.trim(),
      word_start: wordStart,
      word_end: cursor,
    });
  });
  return chunks;
}
