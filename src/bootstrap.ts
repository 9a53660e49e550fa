// HSIE Evidence Pipeline - Composition root
// Wires configuration, SDK clients, the store and every stage together.
//
// SDK clients are created on first use, so commands that never call a service
// (show, lineage, verify, serve) run without API keys.

import { createClient as createDeepgramClient } from "@deepgram/sdk";
import OpenAI from "openai";
import { EnergyRateAcousticAnalyzer } from "./acoustic-analyzer.js";
import { AnalysisStage } from "./analysis-stage.js";
import { AnalyzerRegistry } from "./analyzers.js";
import { requireApiKey, type HsieConfig } from "./config.js";
import { DeepgramDiarizer, SingleSpeakerDiarizer, type DeepgramPrerecordedClient, type Diarizer } from "./diarizer.js";
import { EntryStage } from "./entry-stage.js";
import { EvidenceStore } from "./evidence-store.js";
import { FileEvidenceBackend } from "./file-persistence.js";
import { AggregationStage } from "./hsi-aggregator.js";
import { LexiconLinguisticAnalyzer } from "./linguistic-analyzer.js";
import { createLogger, consoleSink, type LogSink, type PipelineLogger } from "./logger.js";
import { EvidencePipeline } from "./pipeline.js";
import { PreprocessingStage } from "./preprocessing-stage.js";
import { OpenAIJudgeSemanticAnalyzer, type OpenAIChatClient } from "./semantic-analyzer.js";
import { OpenAITranscriptionAdapter, type OpenAITranscriptionClient } from "./transcription-adapter.js";

export interface BootstrapOptions {
  env?: NodeJS.ProcessEnv;
  sink?: LogSink;
}

export type LoggerFactory = (component: string) => PipelineLogger;

export function loggerFactory(config: HsieConfig, sink: LogSink = consoleSink): LoggerFactory {
  return (component) => createLogger(component, { level: config.logLevel, sink });
}

/** Open the file-backed store named by the configuration, verifying every record on load. */
export function openStore(config: HsieConfig, options: BootstrapOptions = {}): Promise<EvidenceStore> {
  const log = loggerFactory(config, options.sink);
  return EvidenceStore.open({ backend: new FileEvidenceBackend(config.storeDir), logger: log("EvidenceStore") });
}

function lazy<T>(create: () => T): () => T {
  let instance: T | undefined;
  return () => {
    if (instance === undefined) {
      instance = create();
    }
    return instance;
  };
}

export function buildPipeline(config: HsieConfig, store: EvidenceStore, options: BootstrapOptions = {}): EvidencePipeline {
  const env = options.env ?? process.env;
  const log = loggerFactory(config, options.sink);

  const openai = lazy(() => new OpenAI({ apiKey: requireApiKey(env, "OPENAI_API_KEY") }));
  const deepgram = lazy(() => createDeepgramClient(requireApiKey(env, "DEEPGRAM_API_KEY")));

  const transcriptionClient: OpenAITranscriptionClient = {
    audio: {
      transcriptions: {
        create: (params, requestOptions) =>
          (openai() as unknown as OpenAITranscriptionClient).audio.transcriptions.create(params, requestOptions),
      },
    },
  };
  const chatClient: OpenAIChatClient = {
    chat: {
      completions: {
        create: (params, requestOptions) =>
          (openai() as unknown as OpenAIChatClient).chat.completions.create(params, requestOptions),
      },
    },
  };
  const deepgramClient: DeepgramPrerecordedClient = {
    listen: {
      prerecorded: {
        transcribeFile: (source, params) =>
          (deepgram() as unknown as DeepgramPrerecordedClient).listen.prerecorded.transcribeFile(source, params),
      },
    },
  };

  const diarizer: Diarizer =
    config.diarization.engine === "deepgram"
      ? new DeepgramDiarizer(deepgramClient, {
          model: config.diarization.model,
          language: config.language ?? undefined,
          logger: log("DeepgramDiarizer"),
        })
      : new SingleSpeakerDiarizer();

  const registry = new AnalyzerRegistry()
    .register(new EnergyRateAcousticAnalyzer())
    .register(new OpenAIJudgeSemanticAnalyzer(chatClient, { model: config.semantic.model }))
    .register(new LexiconLinguisticAnalyzer());

  return new EvidencePipeline({
    store,
    entry: new EntryStage({
      store,
      adapter: new OpenAITranscriptionAdapter(transcriptionClient, {
        model: config.transcription.model,
        minConfidence: config.transcription.minConfidence,
        timeoutMs: config.transcription.timeoutMs,
        logger: log("TranscriptionAdapter"),
      }),
      logger: log("EntryStage"),
    }),
    preprocessing: new PreprocessingStage({
      store,
      diarizer,
      confidenceThreshold: config.diarizationConfidenceThreshold,
      rules: config.segmentation,
      logger: log("PreprocessingStage"),
    }),
    analysis: new AnalysisStage({
      store,
      registry,
      maxConcurrency: config.maxConcurrency,
      analyzerTimeoutMs: config.analyzerTimeoutMs,
      logger: log("AnalysisStage"),
    }),
    aggregation: new AggregationStage({ store, logger: log("HSIAggregator") }),
    selection: config.selection,
    weighting: config.weighting,
    logger: log("Pipeline"),
  });
}
