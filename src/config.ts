// HSIE Evidence Pipeline - Configuration
//
// Defaults, overridden by an optional JSON file (snake_case keys), overridden
// by environment variables. Validated once at start-up; components receive the
// resulting typed object and never read process.env themselves.

import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { z } from "zod";
import type { AnalyzerSelection } from "./analyzers.js";
import { ConfigurationError } from "./errors.js";
import type { LogLevel } from "./logger.js";
import type { SegmentationRules } from "./segment-builder.js";
import type { WeightingConfig } from "./types.js";

const unit = z.number().min(0).max(1);
const analyzerKind = z.enum(["Acoustic", "Semantic", "Linguistic"]);
const weight = z.number().finite().nonnegative();

const ConfigFileSchema = z
  .object({
    diarization_confidence_threshold: unit.default(0.6),
    analyzer_set: z.array(analyzerKind).nonempty().default(["Acoustic", "Semantic", "Linguistic"]),
    analyzer_versions: z
      .object({ Acoustic: z.string().min(1), Semantic: z.string().min(1), Linguistic: z.string().min(1) })
      .partial()
      .strict()
      .default({}),
    weighting_config: z
      .object({
        weights: z
          .object({ Acoustic: weight, Semantic: weight, Linguistic: weight })
          .strict()
          .default({ Acoustic: 0.3, Semantic: 0.4, Linguistic: 0.3 }),
        confidence_weighted: z.boolean().default(true),
      })
      .strict()
      .default({}),
    escalation: z
      .object({
        rate: z.number().finite().nonnegative().default(0.25),
        threshold: unit.default(0.5),
        max_multiplier: z.number().finite().min(1).default(2),
      })
      .strict()
      .default({}),
    max_concurrency: z.number().int().positive().default(4),
    analyzer_timeout_ms: z.number().int().positive().default(30_000),
    store_dir: z.string().min(1).default("data/evidence"),
    language: z.string().min(1).nullable().default(null),
    transcription: z
      .object({
        model: z.string().min(1).default("whisper-1"),
        min_confidence: unit.default(0),
        timeout_ms: z.number().int().positive().default(120_000),
      })
      .strict()
      .default({}),
    diarization: z
      .object({
        engine: z.enum(["deepgram", "single-speaker"]).default("deepgram"),
        model: z.string().min(1).default("nova-2"),
      })
      .strict()
      .default({}),
    semantic: z
      .object({ model: z.string().min(1).default("gpt-4o-mini") })
      .strict()
      .default({}),
    segmentation: z
      .object({
        short_pause_seconds: z.number().positive().default(0.7),
        long_pause_seconds: z.number().positive().default(2.0),
        max_segment_seconds: z.number().positive().default(30),
      })
      .strict()
      .refine((s) => s.short_pause_seconds < s.long_pause_seconds, {
        message: "short_pause_seconds must be below long_pause_seconds",
      })
      .default({}),
    log_level: z.enum(["silent", "error", "warn", "info"]).default("info"),
    port: z.number().int().min(0).max(65535).default(3000),
  })
  .strict();

export type ConfigFile = z.input<typeof ConfigFileSchema>;

export interface HsieConfig {
  diarizationConfidenceThreshold: number;
  selection: AnalyzerSelection;
  weighting: WeightingConfig;
  maxConcurrency: number;
  analyzerTimeoutMs: number;
  storeDir: string;
  language: string | null;
  transcription: { model: string; minConfidence: number; timeoutMs: number };
  diarization: { engine: "deepgram" | "single-speaker"; model: string };
  semantic: { model: string };
  segmentation: SegmentationRules;
  logLevel: LogLevel;
  port: number;
}

export interface LoadConfigOptions {
  /** JSON config file; falls back to HSIE_CONFIG. */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

/** Validate raw (already JSON-decoded) configuration and apply defaults. */
export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = {}): HsieConfig {
  const withEnv = applyEnvOverrides(raw ?? {}, env);
  const result = ConfigFileSchema.safeParse(withEnv);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join("; ")}`);
  }
  const c = result.data;

  return {
    diarizationConfidenceThreshold: c.diarization_confidence_threshold,
    selection: { kinds: c.analyzer_set, versions: c.analyzer_versions },
    weighting: {
      weights: c.weighting_config.weights,
      confidence_weighted: c.weighting_config.confidence_weighted,
      escalation: c.escalation,
    },
    maxConcurrency: c.max_concurrency,
    analyzerTimeoutMs: c.analyzer_timeout_ms,
    storeDir: resolve(c.store_dir),
    language: c.language,
    transcription: {
      model: c.transcription.model,
      minConfidence: c.transcription.min_confidence,
      timeoutMs: c.transcription.timeout_ms,
    },
    diarization: c.diarization,
    semantic: c.semantic,
    segmentation: {
      shortPauseSeconds: c.segmentation.short_pause_seconds,
      longPauseSeconds: c.segmentation.long_pause_seconds,
      maxSegmentSeconds: c.segmentation.max_segment_seconds,
    },
    logLevel: c.log_level,
    port: c.port,
  };
}

function applyEnvOverrides(raw: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    return raw;
  }
  const overrides: Record<string, unknown> = {};
  if (env.HSIE_STORE_DIR) overrides.store_dir = env.HSIE_STORE_DIR;
  if (env.HSIE_LOG_LEVEL) overrides.log_level = env.HSIE_LOG_LEVEL;
  if (env.PORT) overrides.port = Number.parseInt(env.PORT, 10);
  return { ...raw, ...overrides };
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<HsieConfig> {
  const env = options.env ?? process.env;
  const path = options.configPath ?? env.HSIE_CONFIG;

  let raw: unknown = {};
  if (path) {
    let content: string;
    try {
      content = await readFile(path, "utf-8");
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      throw new ConfigurationError(`Cannot read config file ${path}: ${detail}`, undefined, { cause: err });
    }
    try {
      raw = JSON.parse(content);
    } catch (err) {
      throw new ConfigurationError(`Config file ${path} is not valid JSON`, undefined, { cause: err });
    }
  }

  return parseConfig(raw, env);
}

/** API keys are required only by the components that call the service. */
export function requireApiKey(env: NodeJS.ProcessEnv, name: "OPENAI_API_KEY" | "DEEPGRAM_API_KEY"): string {
  const value = env[name];
  if (!value) {
    throw new ConfigurationError(`${name} is not set. Add it to your .env file.`);
  }
  return value;
}
