// HSIE Evidence Pipeline - Entry Stage
//
// Audio file → Raw Evidence. Loads and fingerprints the audio, calls the
// transcription adapter exactly once, and commits the transcript as the root
// of a new lineage chain. No speaker labels, no scoring, no interpretation.
// Nothing is written unless every step succeeds.

import { v4 as uuidv4 } from "uuid";
import { loadAudio } from "./audio-metadata.js";
import { withStageContext } from "./errors.js";
import type { EvidenceStore } from "./evidence-store.js";
import { createLogger, type PipelineLogger } from "./logger.js";
import type { TranscriptionAdapter } from "./transcription-adapter.js";
import type { RawEvidence, RawPayload } from "./types.js";

export const ENTRY_PRODUCER = "entry-stage";

export interface CaptureOptions {
  sessionId?: string;
  language?: string;
}

export interface EntryStageDeps {
  store: EvidenceStore;
  adapter: TranscriptionAdapter;
  logger?: PipelineLogger;
  now?: () => Date;
  newCaptureId?: () => string;
}

export class EntryStage {
  private readonly store: EvidenceStore;
  private readonly adapter: TranscriptionAdapter;
  private readonly logger: PipelineLogger;
  private readonly now: () => Date;
  private readonly newCaptureId: () => string;

  constructor(deps: EntryStageDeps) {
    this.store = deps.store;
    this.adapter = deps.adapter;
    this.logger = deps.logger ?? createLogger("EntryStage");
    this.now = deps.now ?? (() => new Date());
    this.newCaptureId = deps.newCaptureId ?? uuidv4;
  }

  /**
   * @throws TranscriptionError when the audio cannot be read or transcribed.
   */
  async capture(audioPath: string, options: CaptureOptions = {}): Promise<RawEvidence> {
    return withStageContext({ stage: "entry", evidenceId: null }, async () => {
      const audio = await loadAudio(audioPath);
      this.logger.info(`Capturing ${audio.ref.uri} (${audio.ref.byte_length} bytes, sha256 ${audio.ref.sha256})`);

      const transcript = await this.adapter.transcribe(audio, { language: options.language });

      const payload: RawPayload = {
        transcript: transcript.text,
        language: transcript.language,
        word_timings: transcript.word_timings,
        asr_chunks: transcript.chunks,
        timing_precision: transcript.timing_precision,
        overall_confidence: transcript.overall_confidence,
        source_audio: audio.ref,
        capture: {
          capture_id: this.newCaptureId(),
          session_id: options.sessionId ?? null,
          captured_at: this.now().toISOString(),
          engine: transcript.engine,
          model: transcript.model,
        },
      };

      const evidence = await this.store.putAndGet({
        version_kind: "Raw",
        parent_id: null,
        producer: ENTRY_PRODUCER,
        payload,
      });
      this.logger.info(`Raw evidence ${evidence.id} committed`);
      return evidence;
    });
  }
}
