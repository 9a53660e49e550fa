// HSIE Evidence Pipeline - HSI / HSIE Aggregator
//
// Reduces an Analyzed payload to the Harassment Strength Index.
//
//   score_d = Σ c·v / Σ c over the segments scored for dimension d
//             (c = confidence when confidence_weighted, else 1)
//   w'_d    = w_d / Σ w over dimensions that actually contribute
//   HSI     = Σ w'_d · score_d
//
// HSIE re-weights each segment by an escalation multiplier that grows with
// every further flagged segment from the same speaker toward the same
// counterpart, and is capped at 1.
//
// Missing or failed results are excluded, never counted as zero.

import { WeightingConfigSchema } from "./evidence-schema.js";
import { ConfigurationError, InsufficientEvidenceError, withStageContext } from "./errors.js";
import type { EvidenceStore } from "./evidence-store.js";
import { createLogger, type PipelineLogger } from "./logger.js";
import {
  ANALYZER_KINDS,
  UNKNOWN_SPEAKER,
  type AnalyzedPayload,
  type AnalyzerKind,
  type DimensionSummary,
  type HSIComponent,
  type HSIExclusion,
  type HSIScore,
  type ScoredEvidence,
  type SegmentAnalysis,
  type WeightingConfig,
} from "./types.js";
import { clamp01, roundMetric } from "./utils.js";

export const AGGREGATION_PRODUCER = "hsi-aggregator";

export const DEFAULT_WEIGHTING: WeightingConfig = {
  weights: { Acoustic: 0.3, Semantic: 0.4, Linguistic: 0.3 },
  confidence_weighted: true,
  escalation: { rate: 0.25, threshold: 0.5, max_multiplier: 2 },
};

interface Contribution {
  segment: SegmentAnalysis;
  kind: AnalyzerKind;
  value: number;
  confidence: number;
  weight: number; // within-dimension weight
}

/**
 * Escalation multiplier per segment index.
 *
 * A segment's pair is (its speaker, the speaker of the nearest earlier segment
 * with a different real speaker). The k-th flagged segment of a pair (k from 0)
 * gets min(max_multiplier, (1 + rate)^k). Unknown speakers never take part.
 */
export function escalationMultipliers(
  segments: readonly SegmentAnalysis[],
  composite: ReadonlyMap<number, number>,
  escalation: WeightingConfig["escalation"],
): Map<number, number> {
  const multipliers = new Map<number, number>();
  const flaggedByPair = new Map<string, number>();
  const history: string[] = [];

  for (const segment of segments) {
    multipliers.set(segment.segment_index, 1);
    if (segment.speaker_id === UNKNOWN_SPEAKER) continue;

    let counterpart: string | null = null;
    for (let i = history.length - 1; i >= 0; i--) {
      if (history[i] !== segment.speaker_id) {
        counterpart = history[i];
        break;
      }
    }
    history.push(segment.speaker_id);

    const score = composite.get(segment.segment_index);
    if (counterpart === null || score === undefined || score < escalation.threshold) continue;

    const pair = `${segment.speaker_id}->${counterpart}`;
    const k = flaggedByPair.get(pair) ?? 0;
    flaggedByPair.set(pair, k + 1);
    multipliers.set(segment.segment_index, Math.min(escalation.max_multiplier, Math.pow(1 + escalation.rate, k)));
  }

  return multipliers;
}

/**
 * Pure reduction of an Analyzed payload under a weighting.
 * @throws InsufficientEvidenceError when no (segment, dimension) pair contributes.
 * @throws ConfigurationError when the weighting is malformed.
 */
export function computeHsiScore(payload: AnalyzedPayload, weighting: WeightingConfig): HSIScore {
  const checked = WeightingConfigSchema.safeParse(weighting);
  if (!checked.success) {
    throw new ConfigurationError(
      `Invalid weighting: ${checked.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`,
      { stage: "aggregation", evidenceId: null },
    );
  }

  const excluded: HSIExclusion[] = [];
  const byKind = new Map<AnalyzerKind, Contribution[]>();

  for (const segment of payload.segments) {
    for (const kind of ANALYZER_KINDS) {
      const outcome = segment.results[kind];
      if (outcome === undefined) continue;

      if (outcome.status === "failed") {
        excluded.push({ segment_index: segment.segment_index, analyzer: kind, reason: "failed" });
      } else if (!(weighting.weights[kind] > 0)) {
        excluded.push({ segment_index: segment.segment_index, analyzer: kind, reason: "zero_weight" });
      } else if (weighting.confidence_weighted && outcome.confidence === 0) {
        excluded.push({ segment_index: segment.segment_index, analyzer: kind, reason: "zero_confidence" });
      } else {
        const entries = byKind.get(kind) ?? [];
        entries.push({
          segment,
          kind,
          value: outcome.value,
          confidence: outcome.confidence,
          weight: weighting.confidence_weighted ? outcome.confidence : 1,
        });
        byKind.set(kind, entries);
      }
    }
  }

  if (byKind.size === 0) {
    throw new InsufficientEvidenceError(
      `No segment has a usable score for any weighted dimension (${excluded.length} results excluded)`,
      { stage: "aggregation", evidenceId: null },
    );
  }

  const totalDeclared = [...byKind.keys()].reduce((sum, kind) => sum + weighting.weights[kind], 0);
  const effective = new Map<AnalyzerKind, number>();
  const dimensionScore = new Map<AnalyzerKind, number>();
  const dimensions: HSIScore["dimensions"] = {};

  let hsi = 0;
  for (const kind of ANALYZER_KINDS) {
    const entries = byKind.get(kind);
    if (!entries) continue;
    const weightSum = entries.reduce((sum, e) => sum + e.weight, 0);
    const score = entries.reduce((sum, e) => sum + e.weight * e.value, 0) / weightSum;
    const w = weighting.weights[kind] / totalDeclared;
    effective.set(kind, w);
    dimensionScore.set(kind, score);
    hsi += w * score;

    const summary: DimensionSummary = {
      declared_weight: weighting.weights[kind],
      effective_weight: roundMetric(w),
      score: roundMetric(clamp01(score)),
      contributing_segments: entries.length,
    };
    dimensions[kind] = summary;
  }

  // Composite per-segment score, renormalized over the dimensions that segment has.
  const composite = new Map<number, number>();
  const compositeWeight = new Map<number, number>();
  for (const [kind, entries] of byKind) {
    const w = effective.get(kind) ?? 0;
    for (const e of entries) {
      const index = e.segment.segment_index;
      composite.set(index, (composite.get(index) ?? 0) + w * e.value);
      compositeWeight.set(index, (compositeWeight.get(index) ?? 0) + w);
    }
  }
  for (const [index, total] of composite) {
    const w = compositeWeight.get(index) ?? 0;
    composite.set(index, w > 0 ? total / w : 0);
  }

  const multipliers = escalationMultipliers(payload.segments, composite, weighting.escalation);

  const components: HSIComponent[] = [];
  let hsie = 0;
  for (const kind of ANALYZER_KINDS) {
    const entries = byKind.get(kind);
    if (!entries) continue;
    const w = effective.get(kind) ?? 0;
    const weightSum = entries.reduce((sum, e) => sum + e.weight, 0);
    for (const e of entries) {
      const share = e.weight / weightSum;
      const contribution = w * share * e.value;
      const multiplier = multipliers.get(e.segment.segment_index) ?? 1;
      hsie += contribution * multiplier;
      components.push({
        segment_index: e.segment.segment_index,
        analyzer: kind,
        speaker_id: e.segment.speaker_id,
        value: e.value,
        confidence: e.confidence,
        share: roundMetric(clamp01(share)),
        contribution: roundMetric(contribution),
        escalation_multiplier: roundMetric(multiplier),
        extended_contribution: roundMetric(contribution * multiplier),
      });
    }
  }
  components.sort((a, b) => a.segment_index - b.segment_index || ANALYZER_KINDS.indexOf(a.analyzer) - ANALYZER_KINDS.indexOf(b.analyzer));

  return {
    value: roundMetric(clamp01(hsi)),
    extended_value: roundMetric(clamp01(hsie)),
    dimensions,
    components,
    excluded,
    weighting,
    segments_considered: composite.size,
  };
}

export interface AggregationStageDeps {
  store: EvidenceStore;
  logger?: PipelineLogger;
}

export class AggregationStage {
  private readonly store: EvidenceStore;
  private readonly logger: PipelineLogger;

  constructor(deps: AggregationStageDeps) {
    this.store = deps.store;
    this.logger = deps.logger ?? createLogger("HSIAggregator");
  }

  /**
   * Commit the HSIScore as a Scored layer on top of the Analyzed Evidence.
   * The same weighting on the same Analyzed Evidence returns the existing record.
   */
  async aggregate(analyzedEvidenceId: string, weighting: WeightingConfig = DEFAULT_WEIGHTING): Promise<ScoredEvidence> {
    return withStageContext({ stage: "aggregation", evidenceId: analyzedEvidenceId }, async () => {
      const analyzed = await this.store.getAs(analyzedEvidenceId, "Analyzed");
      const hsi = computeHsiScore(analyzed.payload, weighting);

      const evidence = await this.store.putAndGet({
        version_kind: "Scored",
        parent_id: analyzed.id,
        producer: AGGREGATION_PRODUCER,
        payload: { analyzed_evidence_id: analyzed.id, hsi },
      });
      this.logger.info(`Scored evidence ${evidence.id}: HSI ${hsi.value}, HSIE ${hsi.extended_value}`);
      return evidence;
    });
  }
}
