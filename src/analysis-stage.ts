// HSIE Evidence Pipeline - Analysis Stage
//
// Preprocessed Evidence → Analyzed Evidence. Runs the selected analyzers over
// every segment: segments through a bounded pool, the analyzers of one segment
// concurrently, each call under its own timeout. A failing (segment, analyzer)
// pair becomes a failure marker in the payload; it never aborts the stage and
// never touches the other pairs.

import { loadSourceAudio, type LoadedAudio } from "./audio-metadata.js";
import {
  analyzerRef,
  type Analyzer,
  type AnalyzerInput,
  type AnalyzerRegistry,
  type AnalyzerSelection,
} from "./analyzers.js";
import { ConfigurationError, PartialAnalysisError, TranscriptionError, withStageContext } from "./errors.js";
import type { EvidenceStore } from "./evidence-store.js";
import { createLogger, type PipelineLogger } from "./logger.js";
import type {
  AnalysisFailureReason,
  AnalysisOutcome,
  AnalyzedEvidence,
  AnalyzedPayload,
  AnalyzerKind,
  AudioSourceRef,
  Segment,
  SegmentAnalysis,
} from "./types.js";
import { isUnitInterval, mapWithConcurrency, runWithTimeout, TimeoutError } from "./utils.js";

export const ANALYSIS_PRODUCER = "analysis-stage";

export interface AnalysisStageDeps {
  store: EvidenceStore;
  registry: AnalyzerRegistry;
  maxConcurrency?: number;
  analyzerTimeoutMs?: number;
  loadAudio?: (ref: AudioSourceRef) => Promise<LoadedAudio>;
  logger?: PipelineLogger;
}

export class AnalysisStage {
  private readonly store: EvidenceStore;
  private readonly registry: AnalyzerRegistry;
  private readonly maxConcurrency: number;
  private readonly analyzerTimeoutMs: number;
  private readonly loadAudio: (ref: AudioSourceRef) => Promise<LoadedAudio>;
  private readonly logger: PipelineLogger;

  constructor(deps: AnalysisStageDeps) {
    this.store = deps.store;
    this.registry = deps.registry;
    this.maxConcurrency = deps.maxConcurrency ?? 4;
    this.analyzerTimeoutMs = deps.analyzerTimeoutMs ?? 30_000;
    this.loadAudio = deps.loadAudio ?? loadSourceAudio;
    this.logger = deps.logger ?? createLogger("AnalysisStage");
  }

  /**
   * @throws NotFoundError when the id is unknown or not Preprocessed.
   * @throws ConfigurationError when the selection names an unregistered analyzer.
   */
  async analyze(preprocessedEvidenceId: string, selection: AnalyzerSelection): Promise<AnalyzedEvidence> {
    const context = { stage: "analysis" as const, evidenceId: preprocessedEvidenceId };
    return withStageContext(context, async () => {
      const preprocessed = await this.store.getAs(preprocessedEvidenceId, "Preprocessed");
      const raw = await this.store.getAs(preprocessed.payload.raw_evidence_id, "Raw");
      const analyzers = this.registry.resolveSelection(selection);

      const audio = analyzers.some((a) => a.requiresAudio) ? await this.tryLoadAudio(raw.payload.source_audio) : null;
      const segments = preprocessed.payload.segments;

      const analyses = await mapWithConcurrency(segments, this.maxConcurrency, async (segment, i) => {
        const input: AnalyzerInput = {
          segment,
          previous: segments[i - 1] ?? null,
          next: segments[i + 1] ?? null,
          language: raw.payload.language,
          words: raw.payload.word_timings,
          audio,
        };
        const outcomes = await Promise.all(
          analyzers.map(async (analyzer) => [analyzer.kind, await this.runPair(analyzer, input, preprocessedEvidenceId)] as const),
        );
        return toSegmentAnalysis(segment, outcomes);
      });

      const failureCount = analyses.reduce(
        (count, s) => count + Object.values(s.results).filter((o) => o?.status === "failed").length,
        0,
      );

      const payload: AnalyzedPayload = {
        preprocessed_evidence_id: preprocessed.id,
        analyzer_set: analyzers.map(analyzerRef),
        segments: analyses,
        failure_count: failureCount,
      };

      const evidence = await this.store.putAndGet({
        version_kind: "Analyzed",
        parent_id: preprocessed.id,
        producer: ANALYSIS_PRODUCER,
        payload,
      });
      this.logger.info(
        `Analyzed evidence ${evidence.id}: ${analyses.length} segments × ${analyzers.length} analyzers, ${failureCount} failed`,
      );
      return evidence;
    });
  }

  /** Missing audio fails only the analyzers that need it; a changed file is still fatal. */
  private async tryLoadAudio(ref: AudioSourceRef): Promise<LoadedAudio | null> {
    try {
      return await this.loadAudio(ref);
    } catch (err) {
      if (err instanceof TranscriptionError) {
        this.logger.warn(`Source audio unavailable, audio analyzers will fail: ${err.message}`);
        return null;
      }
      throw err;
    }
  }

  private async runPair(analyzer: Analyzer, input: AnalyzerInput, evidenceId: string): Promise<AnalysisOutcome> {
    const label = `${analyzer.kind} analyzer on segment ${input.segment.index}`;
    const fail = (reason: AnalysisFailureReason, message: string, cause?: unknown): AnalysisOutcome => {
      const error = new PartialAnalysisError(
        message,
        { stage: "analysis", evidenceId },
        { segmentIndex: input.segment.index, analyzer: analyzer.kind },
        { cause },
      );
      this.logger.warn(error.toReport());
      return {
        status: "failed",
        error_kind: "PartialAnalysisError",
        reason,
        message,
        analyzer_version: analyzer.version,
      };
    };

    if (analyzer.requiresAudio && input.audio === null) {
      return fail("analyzer_error", `${label}: source audio is unavailable`);
    }

    try {
      const score = await runWithTimeout(label, this.analyzerTimeoutMs, (signal) => analyzer.score(input, signal));
      if (!isUnitInterval(score.value) || !isUnitInterval(score.confidence)) {
        return fail("invalid_score", `${label}: score out of range (value=${score.value}, confidence=${score.confidence})`);
      }
      return { status: "scored", value: score.value, confidence: score.confidence, analyzer_version: analyzer.version };
    } catch (err) {
      // A misconfigured analyzer is not a per-segment failure.
      if (err instanceof ConfigurationError) {
        throw err;
      }
      if (err instanceof TimeoutError) {
        return fail("timeout", err.message, err);
      }
      const detail = err instanceof Error ? err.message : String(err);
      return fail("analyzer_error", `${label}: ${detail}`, err);
    }
  }
}

function toSegmentAnalysis(
  segment: Segment,
  outcomes: ReadonlyArray<readonly [AnalyzerKind, AnalysisOutcome]>,
): SegmentAnalysis {
  const results: SegmentAnalysis["results"] = {};
  for (const [kind, outcome] of outcomes) {
    results[kind] = outcome;
  }
  return {
    segment_index: segment.index,
    speaker_id: segment.speaker_id,
    start_ts: segment.start_ts,
    end_ts: segment.end_ts,
    results,
  };
}
