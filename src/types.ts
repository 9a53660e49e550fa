// HSIE Evidence Pipeline - Shared TypeScript interfaces and types
//
// Evidence records and their payloads are the persisted interchange format,
// so their field names are snake_case exactly as they appear in the JSON files.
// Everything else (options, configuration objects, collaborator contracts) is camelCase.

// ─── Evidence Versions ──────────────────────────────────────────────────────────

export type VersionKind = "Raw" | "Preprocessed" | "Analyzed" | "Scored";

/** Lineage order. A child's kind must be the entry right after its parent's. */
export const VERSION_ORDER: readonly VersionKind[] = ["Raw", "Preprocessed", "Analyzed", "Scored"];

// ─── Raw Payload ────────────────────────────────────────────────────────────────

export interface WordTiming {
  word: string;
  start_ts: number; // seconds from recording start
  end_ts: number;
  confidence: number | null; // null when the engine reports no per-word confidence
}

/** A chunk exactly as the ASR engine segmented it. `word_end` is exclusive. */
export interface RawChunk {
  index: number;
  start_ts: number;
  end_ts: number;
  text: string;
  word_start: number;
  word_end: number;
}

export type TimingPrecision = "word" | "interpolated";

export interface AudioSourceRef {
  uri: string;
  sha256: string;
  byte_length: number;
  format: string | null; // lowercased file extension, e.g. "wav"
  duration_seconds: number | null;
  sample_rate: number | null;
  channels: string | null; // "mono" | "stereo" | "<n>ch"
}

export interface CaptureMetadata {
  capture_id: string;
  session_id: string | null;
  captured_at: string;
  engine: string;
  model: string;
}

export interface RawPayload {
  transcript: string;
  language: string | null;
  word_timings: WordTiming[];
  asr_chunks: RawChunk[];
  timing_precision: TimingPrecision;
  overall_confidence: number | null;
  source_audio: AudioSourceRef;
  capture: CaptureMetadata;
}

// ─── Preprocessed Payload ───────────────────────────────────────────────────────

/** Sentinel speaker id for spans whose diarization confidence fell below threshold. */
export const UNKNOWN_SPEAKER = "unknown";

export type PauseLevel = "SHORT" | "NORMAL" | "LONG";

/** Half-open word range `[word_start, word_end)` into the Raw `word_timings`. */
export interface TranscriptSpan {
  text: string;
  word_start: number;
  word_end: number;
}

export interface Segment {
  index: number;
  start_ts: number;
  end_ts: number;
  speaker_id: string;
  speaker_confidence: number;
  transcript_span: TranscriptSpan;
  pause_before: number;
  pause_level: PauseLevel;
}

export type DiscardReason = "invalid_timing" | "overlapping_timing" | "empty_token" | "silence";

export interface DiscardedSpan {
  word_start: number;
  word_end: number;
  start_ts: number | null; // null when the discarded words carry no usable timing
  end_ts: number | null;
  text: string;
  reason: DiscardReason;
}

export interface TimeRange {
  start_ts: number;
  end_ts: number;
}

export interface PreprocessedPayload {
  raw_evidence_id: string;
  source_time_range: TimeRange | null; // null when no Raw word has usable timing
  segments: Segment[];
  discarded: DiscardedSpan[];
  speakers: string[];
  unknown_speaker_segments: number[];
  diarization: {
    engine: string;
    model: string | null;
    confidence_threshold: number;
    turn_count: number;
  };
  rules: {
    short_pause_seconds: number;
    long_pause_seconds: number;
    max_segment_seconds: number;
  };
}

// ─── Analyzed Payload ───────────────────────────────────────────────────────────

export type AnalyzerKind = "Acoustic" | "Semantic" | "Linguistic";

export const ANALYZER_KINDS: readonly AnalyzerKind[] = ["Acoustic", "Semantic", "Linguistic"];

export type AnalysisFailureReason = "timeout" | "analyzer_error" | "invalid_score";

export interface ScoredOutcome {
  status: "scored";
  value: number; // [0, 1]
  confidence: number; // [0, 1]
  analyzer_version: string;
}

export interface FailedOutcome {
  status: "failed";
  error_kind: "PartialAnalysisError";
  reason: AnalysisFailureReason;
  message: string;
  analyzer_version: string;
}

export type AnalysisOutcome = ScoredOutcome | FailedOutcome;

export interface SegmentAnalysis {
  segment_index: number;
  speaker_id: string;
  start_ts: number;
  end_ts: number;
  results: Partial<Record<AnalyzerKind, AnalysisOutcome>>;
}

export interface AnalyzerRef {
  kind: AnalyzerKind;
  version: string;
}

export interface AnalyzedPayload {
  preprocessed_evidence_id: string;
  analyzer_set: AnalyzerRef[];
  segments: SegmentAnalysis[];
  failure_count: number;
}

// ─── Scored Payload (HSI / HSIE) ────────────────────────────────────────────────

export interface EscalationConfig {
  rate: number; // multiplier growth per repeated flagged segment of the same speaker pair
  threshold: number; // composite segment score at which a segment counts as flagged
  max_multiplier: number;
}

export interface WeightingConfig {
  weights: Record<AnalyzerKind, number>;
  confidence_weighted: boolean;
  escalation: EscalationConfig;
}

export interface DimensionSummary {
  declared_weight: number;
  effective_weight: number;
  score: number;
  contributing_segments: number;
}

export interface HSIComponent {
  segment_index: number;
  analyzer: AnalyzerKind;
  speaker_id: string;
  value: number;
  confidence: number;
  share: number; // this segment's share of its dimension score
  contribution: number; // share of HSI
  escalation_multiplier: number;
  extended_contribution: number; // share of HSIE before the cap
}

export type ExclusionReason = "failed" | "zero_confidence" | "zero_weight";

export interface HSIExclusion {
  segment_index: number;
  analyzer: AnalyzerKind;
  reason: ExclusionReason;
}

export interface HSIScore {
  value: number;
  extended_value: number;
  dimensions: Partial<Record<AnalyzerKind, DimensionSummary>>;
  components: HSIComponent[];
  excluded: HSIExclusion[];
  weighting: WeightingConfig;
  segments_considered: number;
}

export interface ScoredPayload {
  analyzed_evidence_id: string;
  hsi: HSIScore;
}

// ─── Evidence Envelope ──────────────────────────────────────────────────────────

export interface PayloadByKind {
  Raw: RawPayload;
  Preprocessed: PreprocessedPayload;
  Analyzed: AnalyzedPayload;
  Scored: ScoredPayload;
}

export type PayloadFor<K extends VersionKind> = PayloadByKind[K];

export interface EvidenceOf<K extends VersionKind> {
  readonly id: string;
  readonly version_kind: K;
  readonly parent_id: string | null;
  readonly created_at: string;
  readonly producer: string;
  readonly payload: PayloadFor<K>;
}

/** Any Evidence record; narrow with `isEvidenceKind` to reach a typed payload. */
export type Evidence = EvidenceOf<VersionKind>;

export type RawEvidence = EvidenceOf<"Raw">;
export type PreprocessedEvidence = EvidenceOf<"Preprocessed">;
export type AnalyzedEvidence = EvidenceOf<"Analyzed">;
export type ScoredEvidence = EvidenceOf<"Scored">;

/** What a stage submits to the store; id and created_at are assigned on commit. */
export interface EvidenceDraftOf<K extends VersionKind> {
  version_kind: K;
  parent_id: string | null;
  producer: string;
  payload: PayloadFor<K>;
}

export type EvidenceDraft = EvidenceDraftOf<VersionKind>;
