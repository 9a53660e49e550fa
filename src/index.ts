// HSIE Evidence Pipeline - Library entry point

export const APP_NAME = "HSIE Evidence Pipeline";
export const APP_VERSION = "0.1.0";

export * from "./types.js";
export * from "./errors.js";
export { createLogger, consoleSink, stderrSink, silentLogger } from "./logger.js";
export type { LogLevel, LogSink, PipelineLogger } from "./logger.js";

export {
  EvidenceStore,
  InMemoryEvidenceBackend,
  computeEvidenceId,
  isEvidenceKind,
  nextVersionKind,
  versionRank,
} from "./evidence-store.js";
export type {
  EvidenceBackend,
  EvidenceReader,
  EvidenceStoreOptions,
  PersistOutcome,
  VerificationIssue,
} from "./evidence-store.js";
export { FileEvidenceBackend, exportLineageBundle } from "./file-persistence.js";

export { loadAudio, loadSourceAudio, parseWavHeader, SUPPORTED_AUDIO_FORMATS } from "./audio-metadata.js";
export type { LoadedAudio, WavInfo } from "./audio-metadata.js";
export { OpenAITranscriptionAdapter } from "./transcription-adapter.js";
export type { TranscriptionAdapter, TranscriptResult, TranscribeOptions } from "./transcription-adapter.js";
export { DeepgramDiarizer, SingleSpeakerDiarizer } from "./diarizer.js";
export type { Diarizer, DiarizationResult, SpeakerTurn } from "./diarizer.js";
export { buildSegments, DEFAULT_SEGMENTATION_RULES } from "./segment-builder.js";
export type { SegmentationRules } from "./segment-builder.js";

export { AnalyzerRegistry, analyzerRef } from "./analyzers.js";
export type { Analyzer, AnalyzerInput, AnalyzerScore, AnalyzerSelection } from "./analyzers.js";
export { EnergyRateAcousticAnalyzer } from "./acoustic-analyzer.js";
export { OpenAIJudgeSemanticAnalyzer } from "./semantic-analyzer.js";
export { LexiconLinguisticAnalyzer, loadLexicon } from "./linguistic-analyzer.js";

export { EntryStage } from "./entry-stage.js";
export { PreprocessingStage } from "./preprocessing-stage.js";
export { AnalysisStage } from "./analysis-stage.js";
export { AggregationStage, computeHsiScore, DEFAULT_WEIGHTING } from "./hsi-aggregator.js";
export { EvidencePipeline } from "./pipeline.js";
export type { PipelineRun } from "./pipeline.js";

export { loadConfig, parseConfig } from "./config.js";
export type { HsieConfig } from "./config.js";
export { buildPipeline, openStore } from "./bootstrap.js";
export { createEvidenceServer } from "./server.js";
export { runCli } from "./cli.js";
