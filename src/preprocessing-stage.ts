// HSIE Evidence Pipeline - Preprocessing Stage
//
// Raw Evidence → Preprocessed Evidence: speaker diarization plus segment
// reconstruction. Text is never edited; words either land in a segment or in an
// explicit discarded span, and the coverage invariant is verified before commit.

import { loadSourceAudio, type LoadedAudio } from "./audio-metadata.js";
import type { Diarizer } from "./diarizer.js";
import { IntegrityError, withStageContext } from "./errors.js";
import type { EvidenceStore } from "./evidence-store.js";
import { createLogger, type PipelineLogger } from "./logger.js";
import {
  buildSegments,
  DEFAULT_SEGMENTATION_RULES,
  verifySegmentCoverage,
  type SegmentationRules,
} from "./segment-builder.js";
import type { AudioSourceRef, PreprocessedEvidence, PreprocessedPayload } from "./types.js";

export const PREPROCESSING_PRODUCER = "preprocessing-stage";

export interface PreprocessingStageDeps {
  store: EvidenceStore;
  diarizer: Diarizer;
  confidenceThreshold: number;
  rules?: SegmentationRules;
  /** Loads the captured audio for diarizers that need it. Defaults to re-reading the file and checking its hash. */
  loadAudio?: (ref: AudioSourceRef) => Promise<LoadedAudio>;
  logger?: PipelineLogger;
}

export class PreprocessingStage {
  private readonly store: EvidenceStore;
  private readonly diarizer: Diarizer;
  private readonly confidenceThreshold: number;
  private readonly rules: SegmentationRules;
  private readonly loadAudio: (ref: AudioSourceRef) => Promise<LoadedAudio>;
  private readonly logger: PipelineLogger;

  constructor(deps: PreprocessingStageDeps) {
    this.store = deps.store;
    this.diarizer = deps.diarizer;
    this.confidenceThreshold = deps.confidenceThreshold;
    this.rules = deps.rules ?? DEFAULT_SEGMENTATION_RULES;
    this.loadAudio = deps.loadAudio ?? loadSourceAudio;
    this.logger = deps.logger ?? createLogger("PreprocessingStage");
  }

  /**
   * @throws NotFoundError when the id is unknown or not Raw.
   * @throws IntegrityError when Raw timings are unsorted or coverage fails.
   */
  async preprocess(rawEvidenceId: string): Promise<PreprocessedEvidence> {
    const context = { stage: "preprocessing" as const, evidenceId: rawEvidenceId };
    return withStageContext(context, async () => {
      const raw = await this.store.getAs(rawEvidenceId, "Raw");
      const words = raw.payload.word_timings;

      const audio = this.diarizer.requiresAudio ? await this.loadAudio(raw.payload.source_audio) : null;
      const diarization = await this.diarizer.diarize({ audio, words });

      const result = buildSegments({
        words,
        chunks: raw.payload.asr_chunks,
        turns: diarization.turns,
        language: raw.payload.language,
        confidenceThreshold: this.confidenceThreshold,
        rules: this.rules,
      });

      const issues = verifySegmentCoverage(result, words);
      if (issues.length > 0) {
        throw new IntegrityError(`Segment coverage check failed: ${issues.join("; ")}`, context);
      }

      const payload: PreprocessedPayload = {
        raw_evidence_id: raw.id,
        ...result,
        diarization: {
          engine: diarization.engine,
          model: diarization.model,
          confidence_threshold: this.confidenceThreshold,
          turn_count: diarization.turns.length,
        },
        rules: {
          short_pause_seconds: this.rules.shortPauseSeconds,
          long_pause_seconds: this.rules.longPauseSeconds,
          max_segment_seconds: this.rules.maxSegmentSeconds,
        },
      };

      const evidence = await this.store.putAndGet({
        version_kind: "Preprocessed",
        parent_id: raw.id,
        producer: PREPROCESSING_PRODUCER,
        payload,
      });
      this.logger.info(
        `Preprocessed evidence ${evidence.id}: ${result.segments.length} segments, ` +
          `${result.speakers.length} speakers, ${result.unknown_speaker_segments.length} unknown, ` +
          `${result.discarded.length} discarded spans`,
      );
      return evidence;
    });
  }
}
