// HSIE Evidence Pipeline - Orchestrator
//
// Entry → Preprocessing → Analysis → Aggregation, strictly in order along one
// lineage chain. Each step commits before the next starts, so after a failure
// `resume` picks up from the last committed Evidence instead of starting over.

import type { AnalysisStage } from "./analysis-stage.js";
import type { AnalyzerSelection } from "./analyzers.js";
import type { CaptureOptions, EntryStage } from "./entry-stage.js";
import { IntegrityError } from "./errors.js";
import { isEvidenceKind, type EvidenceStore } from "./evidence-store.js";
import type { AggregationStage } from "./hsi-aggregator.js";
import { createLogger, type PipelineLogger } from "./logger.js";
import type { PreprocessingStage } from "./preprocessing-stage.js";
import type {
  AnalyzedEvidence,
  Evidence,
  PreprocessedEvidence,
  RawEvidence,
  ScoredEvidence,
  WeightingConfig,
} from "./types.js";

export interface PipelineRun {
  raw: RawEvidence;
  preprocessed: PreprocessedEvidence;
  analyzed: AnalyzedEvidence;
  scored: ScoredEvidence;
}

export interface EvidencePipelineDeps {
  store: EvidenceStore;
  entry: EntryStage;
  preprocessing: PreprocessingStage;
  analysis: AnalysisStage;
  aggregation: AggregationStage;
  selection: AnalyzerSelection;
  weighting: WeightingConfig;
  logger?: PipelineLogger;
}

export class EvidencePipeline {
  readonly store: EvidenceStore;
  private readonly entry: EntryStage;
  private readonly preprocessing: PreprocessingStage;
  private readonly analysis: AnalysisStage;
  private readonly aggregation: AggregationStage;
  private readonly selection: AnalyzerSelection;
  private readonly weighting: WeightingConfig;
  private readonly logger: PipelineLogger;

  constructor(deps: EvidencePipelineDeps) {
    this.store = deps.store;
    this.entry = deps.entry;
    this.preprocessing = deps.preprocessing;
    this.analysis = deps.analysis;
    this.aggregation = deps.aggregation;
    this.selection = deps.selection;
    this.weighting = deps.weighting;
    this.logger = deps.logger ?? createLogger("Pipeline");
  }

  capture(audioPath: string, options?: CaptureOptions): Promise<RawEvidence> {
    return this.entry.capture(audioPath, options);
  }

  preprocess(rawEvidenceId: string): Promise<PreprocessedEvidence> {
    return this.preprocessing.preprocess(rawEvidenceId);
  }

  analyze(preprocessedEvidenceId: string, selection: AnalyzerSelection = this.selection): Promise<AnalyzedEvidence> {
    return this.analysis.analyze(preprocessedEvidenceId, selection);
  }

  aggregate(analyzedEvidenceId: string, weighting: WeightingConfig = this.weighting): Promise<ScoredEvidence> {
    return this.aggregation.aggregate(analyzedEvidenceId, weighting);
  }

  async run(audioPath: string, options?: CaptureOptions): Promise<PipelineRun> {
    const raw = await this.capture(audioPath, options);
    return this.continueFrom(raw);
  }

  /**
   * Run whatever stages remain after `evidenceId`. A Scored id just returns its chain.
   */
  async resume(evidenceId: string): Promise<PipelineRun> {
    const evidence = await this.store.get(evidenceId);
    this.logger.info(`Resuming from ${evidence.version_kind} evidence ${evidence.id}`);
    return this.continueFrom(evidence);
  }

  private async continueFrom(evidence: Evidence): Promise<PipelineRun> {
    const chain = await this.store.lineage(evidence.id);
    const find = <K extends Evidence["version_kind"]>(kind: K) => {
      const found = chain.find((e) => e.version_kind === kind);
      return found && isEvidenceKind(found, kind) ? found : null;
    };

    const raw = find("Raw");
    if (!raw) {
      throw new IntegrityError(`Lineage of ${evidence.id} has no Raw root`, { stage: "store", evidenceId: evidence.id });
    }
    const preprocessed = find("Preprocessed") ?? (await this.preprocess(raw.id));
    const analyzed = find("Analyzed") ?? (await this.analyze(preprocessed.id));
    const scored = find("Scored") ?? (await this.aggregate(analyzed.id));

    return { raw, preprocessed, analyzed, scored };
  }
}
