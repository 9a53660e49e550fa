// Evidence JSON schema: the persisted / interchange format, one schema per version kind.
//
// Reading is backward compatible: unknown members are passed through untouched
// (they are part of the hashed content), so files written by a newer release
// that added optional fields still load and still verify.

import { z } from "zod";
import { VERSION_ORDER, type Evidence, type EvidenceDraft } from "./types.js";

const timestamp = z.number().finite().nonnegative();
const unit = z.number().finite().min(0).max(1);
const analyzerKind = z.enum(["Acoustic", "Semantic", "Linguistic"]);

// ─── Raw ────────────────────────────────────────────────────────────────────────

const WordTimingSchema = z
  .object({
    word: z.string(),
    start_ts: z.number().finite(),
    end_ts: z.number().finite(),
    confidence: unit.nullable(),
  })
  .passthrough();

const RawChunkSchema = z
  .object({
    index: z.number().int().nonnegative(),
    start_ts: z.number().finite(),
    end_ts: z.number().finite(),
    text: z.string(),
    word_start: z.number().int().nonnegative(),
    word_end: z.number().int().nonnegative(),
  })
  .passthrough();

const AudioSourceRefSchema = z
  .object({
    uri: z.string().min(1),
    sha256: z.string().regex(/^[0-9a-f]{64}$/),
    byte_length: z.number().int().nonnegative(),
    format: z.string().nullable(),
    duration_seconds: z.number().finite().nonnegative().nullable(),
    sample_rate: z.number().int().positive().nullable(),
    channels: z.string().nullable(),
  })
  .passthrough();

export const RawPayloadSchema = z
  .object({
    transcript: z.string(),
    language: z.string().nullable(),
    word_timings: z.array(WordTimingSchema),
    asr_chunks: z.array(RawChunkSchema),
    timing_precision: z.enum(["word", "interpolated"]),
    overall_confidence: unit.nullable(),
    source_audio: AudioSourceRefSchema,
    capture: z
      .object({
        capture_id: z.string().min(1),
        session_id: z.string().nullable(),
        captured_at: z.string().datetime(),
        engine: z.string().min(1),
        model: z.string().min(1),
      })
      .passthrough(),
  })
  .passthrough();

// ─── Preprocessed ───────────────────────────────────────────────────────────────

const SegmentSchema = z
  .object({
    index: z.number().int().nonnegative(),
    start_ts: timestamp,
    end_ts: timestamp,
    speaker_id: z.string().min(1),
    speaker_confidence: unit,
    transcript_span: z
      .object({
        text: z.string(),
        word_start: z.number().int().nonnegative(),
        word_end: z.number().int().nonnegative(),
      })
      .passthrough(),
    pause_before: z.number().finite().nonnegative(),
    pause_level: z.enum(["SHORT", "NORMAL", "LONG"]),
  })
  .passthrough();

const DiscardedSpanSchema = z
  .object({
    word_start: z.number().int().nonnegative(),
    word_end: z.number().int().nonnegative(),
    start_ts: z.number().finite().nullable(),
    end_ts: z.number().finite().nullable(),
    text: z.string(),
    reason: z.enum(["invalid_timing", "overlapping_timing", "empty_token", "silence"]),
  })
  .passthrough();

export const PreprocessedPayloadSchema = z
  .object({
    raw_evidence_id: z.string().min(1),
    source_time_range: z.object({ start_ts: timestamp, end_ts: timestamp }).passthrough().nullable(),
    segments: z.array(SegmentSchema),
    discarded: z.array(DiscardedSpanSchema),
    speakers: z.array(z.string()),
    unknown_speaker_segments: z.array(z.number().int().nonnegative()),
    diarization: z
      .object({
        engine: z.string().min(1),
        model: z.string().nullable(),
        confidence_threshold: unit,
        turn_count: z.number().int().nonnegative(),
      })
      .passthrough(),
    rules: z
      .object({
        short_pause_seconds: z.number().finite().positive(),
        long_pause_seconds: z.number().finite().positive(),
        max_segment_seconds: z.number().finite().positive(),
      })
      .passthrough(),
  })
  .passthrough();

// ─── Analyzed ───────────────────────────────────────────────────────────────────

const AnalysisOutcomeSchema = z.discriminatedUnion("status", [
  z
    .object({
      status: z.literal("scored"),
      value: unit,
      confidence: unit,
      analyzer_version: z.string().min(1),
    })
    .passthrough(),
  z
    .object({
      status: z.literal("failed"),
      error_kind: z.literal("PartialAnalysisError"),
      reason: z.enum(["timeout", "analyzer_error", "invalid_score"]),
      message: z.string(),
      analyzer_version: z.string().min(1),
    })
    .passthrough(),
]);

export const AnalyzedPayloadSchema = z
  .object({
    preprocessed_evidence_id: z.string().min(1),
    analyzer_set: z.array(z.object({ kind: analyzerKind, version: z.string().min(1) }).passthrough()),
    segments: z.array(
      z
        .object({
          segment_index: z.number().int().nonnegative(),
          speaker_id: z.string().min(1),
          start_ts: timestamp,
          end_ts: timestamp,
          results: z
            .object({
              Acoustic: AnalysisOutcomeSchema.optional(),
              Semantic: AnalysisOutcomeSchema.optional(),
              Linguistic: AnalysisOutcomeSchema.optional(),
            })
            .passthrough(),
        })
        .passthrough(),
    ),
    failure_count: z.number().int().nonnegative(),
  })
  .passthrough();

// ─── Scored ─────────────────────────────────────────────────────────────────────

const weight = z.number().finite().nonnegative();

export const WeightingConfigSchema = z
  .object({
    weights: z.object({ Acoustic: weight, Semantic: weight, Linguistic: weight }).passthrough(),
    confidence_weighted: z.boolean(),
    escalation: z
      .object({
        rate: z.number().finite().nonnegative(),
        threshold: unit,
        max_multiplier: z.number().finite().min(1),
      })
      .passthrough(),
  })
  .passthrough();

const DimensionSummarySchema = z
  .object({
    declared_weight: weight,
    effective_weight: unit,
    score: unit,
    contributing_segments: z.number().int().positive(),
  })
  .passthrough();

export const ScoredPayloadSchema = z
  .object({
    analyzed_evidence_id: z.string().min(1),
    hsi: z
      .object({
        value: unit,
        extended_value: unit,
        dimensions: z
          .object({
            Acoustic: DimensionSummarySchema.optional(),
            Semantic: DimensionSummarySchema.optional(),
            Linguistic: DimensionSummarySchema.optional(),
          })
          .passthrough(),
        components: z.array(
          z
            .object({
              segment_index: z.number().int().nonnegative(),
              analyzer: analyzerKind,
              speaker_id: z.string().min(1),
              value: unit,
              confidence: unit,
              share: unit,
              contribution: z.number().finite().nonnegative(),
              escalation_multiplier: z.number().finite().min(1),
              extended_contribution: z.number().finite().nonnegative(),
            })
            .passthrough(),
        ),
        excluded: z.array(
          z
            .object({
              segment_index: z.number().int().nonnegative(),
              analyzer: analyzerKind,
              reason: z.enum(["failed", "zero_confidence", "zero_weight"]),
            })
            .passthrough(),
        ),
        weighting: WeightingConfigSchema,
        segments_considered: z.number().int().nonnegative(),
      })
      .passthrough(),
  })
  .passthrough();

// ─── Envelope ───────────────────────────────────────────────────────────────────

const envelope = {
  id: z.string().regex(/^[0-9a-f]{64}$/),
  created_at: z.string().datetime(),
  producer: z.string().min(1),
};

export const EvidenceRecordSchema = z.discriminatedUnion("version_kind", [
  z.object({ ...envelope, version_kind: z.literal("Raw"), parent_id: z.null(), payload: RawPayloadSchema }),
  z.object({
    ...envelope,
    version_kind: z.literal("Preprocessed"),
    parent_id: z.string().min(1),
    payload: PreprocessedPayloadSchema,
  }),
  z.object({
    ...envelope,
    version_kind: z.literal("Analyzed"),
    parent_id: z.string().min(1),
    payload: AnalyzedPayloadSchema,
  }),
  z.object({
    ...envelope,
    version_kind: z.literal("Scored"),
    parent_id: z.string().min(1),
    payload: ScoredPayloadSchema,
  }),
]);

const PAYLOAD_SCHEMAS = {
  Raw: RawPayloadSchema,
  Preprocessed: PreprocessedPayloadSchema,
  Analyzed: AnalyzedPayloadSchema,
  Scored: ScoredPayloadSchema,
} as const;

export type SchemaCheck = { ok: true } | { ok: false; issues: string[] };

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
}

/** Validate a draft payload against the schema for its declared kind. */
export function checkDraft(draft: EvidenceDraft): SchemaCheck {
  if (!VERSION_ORDER.includes(draft.version_kind)) {
    return { ok: false, issues: [`version_kind: unknown kind "${String(draft.version_kind)}"`] };
  }
  const result = PAYLOAD_SCHEMAS[draft.version_kind].safeParse(draft.payload);
  return result.success ? { ok: true } : { ok: false, issues: formatIssues(result.error) };
}

export type ParsedRecord = { ok: true; evidence: Evidence } | { ok: false; issues: string[] };

/** Parse a persisted record (already JSON-decoded). */
export function parseEvidenceRecord(value: unknown): ParsedRecord {
  const result = EvidenceRecordSchema.safeParse(value);
  if (!result.success) {
    return { ok: false, issues: formatIssues(result.error) };
  }
  return { ok: true, evidence: result.data };
}
