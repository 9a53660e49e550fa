// HSIE Evidence Pipeline - Error taxonomy
//
// Every fatal error names the taxonomy kind, the stage that raised it, and the
// Evidence id the stage was working on, so an operator can resume from the last
// committed Evidence instead of re-running the whole chain.

import type { VersionKind } from "./types.js";

export type PipelineErrorKind =
  | "TranscriptionError"
  | "IntegrityError"
  | "NotFoundError"
  | "PartialAnalysisError"
  | "InsufficientEvidenceError"
  | "ConfigurationError";

export type PipelineStage =
  | "store"
  | "entry"
  | "preprocessing"
  | "analysis"
  | "aggregation"
  | "config"
  | "cli";

export interface ErrorContext {
  stage: PipelineStage;
  evidenceId: string | null;
}

export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;
  readonly stage: PipelineStage;
  readonly evidenceId: string | null;

  constructor(message: string, context: ErrorContext, options?: { cause?: unknown }) {
    super(message, options);
    this.stage = context.stage;
    this.evidenceId = context.evidenceId;
  }

  /** Single-line rendering used on the CLI error stream and in logs. */
  toReport(): string {
    return `${this.kind} [stage=${this.stage}] [evidence=${this.evidenceId ?? "-"}]: ${this.message}`;
  }
}

// ─── Transcription ──────────────────────────────────────────────────────────────

export type TranscriptionFailureReason =
  | "unsupported_format"
  | "low_confidence"
  | "timeout"
  | "audio_unreadable"
  | "engine_failure";

export class TranscriptionError extends PipelineError {
  readonly kind = "TranscriptionError";
  readonly reason: TranscriptionFailureReason;

  constructor(
    reason: TranscriptionFailureReason,
    message: string,
    context: ErrorContext = { stage: "entry", evidenceId: null },
    options?: { cause?: unknown },
  ) {
    super(message, context, options);
    this.name = "TranscriptionError";
    this.reason = reason;
  }

  override toReport(): string {
    return `${super.toReport()} (reason=${this.reason})`;
  }
}

// ─── Lineage / store ────────────────────────────────────────────────────────────

export class IntegrityError extends PipelineError {
  readonly kind = "IntegrityError";

  constructor(message: string, context: ErrorContext, options?: { cause?: unknown }) {
    super(message, context, options);
    this.name = "IntegrityError";
  }
}

export class NotFoundError extends PipelineError {
  readonly kind = "NotFoundError";
  /** Set when the id exists but holds a different version kind than the caller required. */
  readonly expectedKind: VersionKind | null;
  readonly actualKind: VersionKind | null;

  constructor(
    message: string,
    context: ErrorContext,
    kinds: { expected?: VersionKind; actual?: VersionKind } = {},
    options?: { cause?: unknown },
  ) {
    super(message, context, options);
    this.name = "NotFoundError";
    this.expectedKind = kinds.expected ?? null;
    this.actualKind = kinds.actual ?? null;
  }
}

// ─── Analysis / aggregation ─────────────────────────────────────────────────────

/**
 * Scoped to one (segment, analyzer) pair. The analysis stage records it inline
 * as a failure marker in the Analyzed payload; it never escapes the stage.
 */
export class PartialAnalysisError extends PipelineError {
  readonly kind = "PartialAnalysisError";
  readonly segmentIndex: number;
  readonly analyzer: string;

  constructor(
    message: string,
    context: ErrorContext,
    pair: { segmentIndex: number; analyzer: string },
    options?: { cause?: unknown },
  ) {
    super(message, context, options);
    this.name = "PartialAnalysisError";
    this.segmentIndex = pair.segmentIndex;
    this.analyzer = pair.analyzer;
  }
}

export class InsufficientEvidenceError extends PipelineError {
  readonly kind = "InsufficientEvidenceError";

  constructor(message: string, context: ErrorContext, options?: { cause?: unknown }) {
    super(message, context, options);
    this.name = "InsufficientEvidenceError";
  }
}

export class ConfigurationError extends PipelineError {
  readonly kind = "ConfigurationError";

  constructor(message: string, context: ErrorContext = { stage: "config", evidenceId: null }, options?: { cause?: unknown }) {
    super(message, context, options);
    this.name = "ConfigurationError";
  }
}

// ─── Helpers ────────────────────────────────────────────────────────────────────

export function isPipelineError(err: unknown): err is PipelineError {
  return err instanceof PipelineError;
}

/**
 * Re-tag an error raised by the store (or by a stage helper that did not know
 * the Evidence id) so it reports the stage that was running and its input.
 * Errors that already carry a full context keep it.
 */
export function inStage(err: PipelineError, context: ErrorContext): PipelineError {
  const needsContext = err.stage === "store" || (err.stage === context.stage && err.evidenceId === null);
  if (!needsContext) {
    return err;
  }
  const options = { cause: err };
  if (err instanceof TranscriptionError) {
    return new TranscriptionError(err.reason, err.message, context, options);
  }
  if (err instanceof NotFoundError) {
    return new NotFoundError(
      err.message,
      context,
      { expected: err.expectedKind ?? undefined, actual: err.actualKind ?? undefined },
      options,
    );
  }
  if (err instanceof PartialAnalysisError) {
    return new PartialAnalysisError(
      err.message,
      context,
      { segmentIndex: err.segmentIndex, analyzer: err.analyzer },
      options,
    );
  }
  if (err instanceof InsufficientEvidenceError) {
    return new InsufficientEvidenceError(err.message, context, options);
  }
  if (err instanceof ConfigurationError) {
    return new ConfigurationError(err.message, context, options);
  }
  return new IntegrityError(err.message, context, options);
}

/** Run `fn`, re-tagging store errors with the calling stage's context. */
export async function withStageContext<T>(context: ErrorContext, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (isPipelineError(err)) {
      throw inStage(err, context);
    }
    throw err;
  }
}

export function describeError(err: unknown): string {
  if (isPipelineError(err)) {
    return err.toReport();
  }
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
