// HSIE Evidence Pipeline - Segment reconstruction
//
// Turns Raw word timings plus diarization turns into speaker-labelled segments.
// Purely mechanical: fixed word lists and time thresholds, no interpretation.
//
// Output invariant, checked by verifySegmentCoverage before anything is committed:
//   - every Raw word index lies in exactly one segment or one discarded span
//   - segments are ordered by start_ts and do not overlap
//   - segments plus timed discarded spans (including "silence") cover the
//     transcript's time range, earliest to latest timed word, with no holes

import type { SpeakerTurn } from "./diarizer.js";
import { IntegrityError } from "./errors.js";
import {
  UNKNOWN_SPEAKER,
  type DiscardedSpan,
  type DiscardReason,
  type PauseLevel,
  type RawChunk,
  type Segment,
  type TimeRange,
  type WordTiming,
} from "./types.js";
import { roundMetric } from "./utils.js";

export const PAUSE_THRESHOLD_SHORT = 0.7; // seconds
export const PAUSE_THRESHOLD_LONG = 2.0; // seconds
export const MAX_SEGMENT_SECONDS = 30;

// Mechanical word lists. A group made only of fillers is folded into the
// previous utterance; a group ending in an incomplete ending is joined to the
// next one when the pause between them is short.
const FILLER_WORDS: Record<"en" | "ja", ReadonlySet<string>> = {
  en: new Set(["um", "uh", "er", "ah", "erm", "hmm", "mm", "uh-huh", "you know", "i mean"]),
  ja: new Set(["えー", "あの", "そのー", "えっと", "まあ", "なんか", "その", "あー", "うーん", "んー"]),
};

const INCOMPLETE_ENDINGS: Record<"en" | "ja", readonly string[]> = {
  en: ["and", "but", "or", "so", "because", "that", "which", "if", "when", "the", "a", "to"],
  ja: ["て", "で", "から", "ので", "のに", "けど", "が", "けれど", "けれども", "、"],
};

export interface SegmentationRules {
  shortPauseSeconds: number;
  longPauseSeconds: number;
  maxSegmentSeconds: number;
}

export const DEFAULT_SEGMENTATION_RULES: SegmentationRules = {
  shortPauseSeconds: PAUSE_THRESHOLD_SHORT,
  longPauseSeconds: PAUSE_THRESHOLD_LONG,
  maxSegmentSeconds: MAX_SEGMENT_SECONDS,
};

export interface BuildSegmentsInput {
  words: readonly WordTiming[];
  chunks: readonly RawChunk[];
  turns: readonly SpeakerTurn[];
  language: string | null;
  confidenceThreshold: number;
  rules?: SegmentationRules;
}

export interface SegmentationResult {
  source_time_range: TimeRange | null;
  segments: Segment[];
  discarded: DiscardedSpan[];
  speakers: string[];
  unknown_speaker_segments: number[];
}

type LanguageFamily = "en" | "ja";

export function languageFamily(language: string | null): LanguageFamily {
  return language !== null && /^(ja|japanese)\b/i.test(language.trim()) ? "ja" : "en";
}

export function classifyPauseLevel(pause: number, rules: SegmentationRules = DEFAULT_SEGMENTATION_RULES): PauseLevel {
  if (pause < rules.shortPauseSeconds) return "SHORT";
  if (pause < rules.longPauseSeconds) return "NORMAL";
  return "LONG";
}

function joinWords(words: readonly string[], family: LanguageFamily): string {
  return words.join(family === "ja" ? "" : " ").trim();
}

function normalizeForMatch(text: string, family: LanguageFamily): string {
  const trimmed = text.trim();
  if (family === "ja") return trimmed.replace(/[。、！？!?]+$/u, "");
  return trimmed.toLowerCase().replace(/[.,!?;:"]+/g, "").replace(/\s+/g, " ");
}

export function isFillerOnly(text: string, family: LanguageFamily): boolean {
  const normalized = normalizeForMatch(text, family);
  if (normalized.length === 0) return false;
  if (FILLER_WORDS[family].has(normalized)) return true;
  if (family === "ja") return false;
  return normalized.split(" ").every((token) => FILLER_WORDS.en.has(token));
}

export function hasIncompleteEnding(text: string, family: LanguageFamily): boolean {
  const trimmed = text.trim();
  if (family === "ja") {
    return INCOMPLETE_ENDINGS.ja.some((ending) => trimmed.endsWith(ending));
  }
  if (trimmed.endsWith(",")) return true;
  const lastWord = trimmed.toLowerCase().split(/\s+/).pop() ?? "";
  return INCOMPLETE_ENDINGS.en.includes(lastWord.replace(/[^a-z'-]/g, ""));
}

function hasValidTiming(word: WordTiming): boolean {
  return Number.isFinite(word.start_ts) && Number.isFinite(word.end_ts) && word.start_ts >= 0 && word.end_ts >= word.start_ts;
}

// ─── Speaker assignment ─────────────────────────────────────────────────────────

interface Labelled {
  speaker: string;
  confidence: number;
}

/**
 * The turn containing the word's midpoint wins; among overlapping turns the
 * most confident one. A word outside every turn takes the nearest turn.
 * Turns under the confidence threshold label their words "unknown".
 */
export function labelWord(word: WordTiming, turns: readonly SpeakerTurn[], threshold: number): Labelled {
  if (turns.length === 0) {
    return { speaker: UNKNOWN_SPEAKER, confidence: 0 };
  }

  const mid = (word.start_ts + word.end_ts) / 2;
  let best: SpeakerTurn | null = null;
  for (const turn of turns) {
    if (turn.start_ts <= mid && mid <= turn.end_ts && (best === null || turn.confidence > best.confidence)) {
      best = turn;
    }
  }

  if (best === null) {
    let bestDistance = Infinity;
    for (const turn of turns) {
      const distance = mid < turn.start_ts ? turn.start_ts - mid : mid - turn.end_ts;
      if (distance < bestDistance) {
        bestDistance = distance;
        best = turn;
      }
    }
  }

  if (best === null || best.confidence < threshold) {
    return { speaker: UNKNOWN_SPEAKER, confidence: best ? best.confidence : 0 };
  }
  return { speaker: best.speaker_id, confidence: best.confidence };
}

// ─── Build ──────────────────────────────────────────────────────────────────────

interface Unit {
  indices: number[]; // contiguous Raw word indices
  speaker: string;
}

export function buildSegments(input: BuildSegmentsInput): SegmentationResult {
  const rules = input.rules ?? DEFAULT_SEGMENTATION_RULES;
  const family = languageFamily(input.language);
  const words = input.words;

  for (const turn of input.turns) {
    if (turn.speaker_id === UNKNOWN_SPEAKER) {
      throw new IntegrityError(`Diarizer returned the reserved speaker id "${UNKNOWN_SPEAKER}"`, {
        stage: "preprocessing",
        evidenceId: null,
      });
    }
  }

  // Raw timings must arrive sorted; anything else means the Raw layer is corrupt.
  let lastStart = -Infinity;
  for (let i = 0; i < words.length; i++) {
    if (!hasValidTiming(words[i])) continue;
    if (words[i].start_ts < lastStart) {
      throw new IntegrityError(`Raw word timings are not sorted by start_ts (word ${i})`, {
        stage: "preprocessing",
        evidenceId: null,
      });
    }
    lastStart = words[i].start_ts;
  }

  // 1. Keep or discard each word.
  const discardReason: Array<DiscardReason | null> = [];
  let lastKeptEnd = -Infinity;
  for (const word of words) {
    if (word.word.trim().length === 0) {
      discardReason.push("empty_token");
    } else if (!hasValidTiming(word)) {
      discardReason.push("invalid_timing");
    } else if (word.start_ts < lastKeptEnd) {
      discardReason.push("overlapping_timing");
    } else {
      discardReason.push(null);
      lastKeptEnd = word.end_ts;
    }
  }

  const discarded = collectDiscarded(words, discardReason, family);

  // 2. Label kept words and group them by chunk and speaker. A discarded word
  //    always closes the current group, so every group is a contiguous range.
  const chunkOf = new Array<number>(words.length).fill(-1);
  for (const chunk of input.chunks) {
    for (let i = chunk.word_start; i < Math.min(chunk.word_end, words.length); i++) {
      chunkOf[i] = chunk.index;
    }
  }

  const confidenceOf = new Array<number>(words.length).fill(0);
  let units: Unit[] = [];
  let current: Unit | null = null;
  for (let i = 0; i < words.length; i++) {
    if (discardReason[i] !== null) {
      current = null;
      continue;
    }
    const label = labelWord(words[i], input.turns, input.confidenceThreshold);
    confidenceOf[i] = label.confidence;

    const previous = i - 1;
    const sameGroup =
      current !== null &&
      current.speaker === label.speaker &&
      chunkOf[previous] === chunkOf[i] &&
      words[i].start_ts - words[previous].end_ts < rules.longPauseSeconds;
    if (current !== null && sameGroup) {
      current.indices.push(i);
    } else {
      current = { indices: [i], speaker: label.speaker };
      units.push(current);
    }
  }

  // 3. Merge rules, then the length cap.
  units = applyMergeRules(units, words, family, rules);
  units = units.flatMap((unit) => splitLongUnit(unit, words, rules.maxSegmentSeconds));

  // 4. Segments.
  const segments = units.map((unit, index): Segment => {
    const first = unit.indices[0];
    const last = unit.indices[unit.indices.length - 1];
    const meanConfidence = unit.indices.reduce((sum, i) => sum + confidenceOf[i], 0) / unit.indices.length;
    return {
      index,
      start_ts: words[first].start_ts,
      end_ts: words[last].end_ts,
      speaker_id: unit.speaker,
      speaker_confidence: roundMetric(meanConfidence),
      transcript_span: {
        text: joinWords(unit.indices.map((i) => words[i].word.trim()), family),
        word_start: first,
        word_end: last + 1,
      },
      pause_before: 0,
      pause_level: "SHORT",
    };
  });
  for (let i = 1; i < segments.length; i++) {
    const pause = roundMetric(Math.max(0, segments[i].start_ts - segments[i - 1].end_ts));
    segments[i].pause_before = pause;
    segments[i].pause_level = classifyPauseLevel(pause, rules);
  }

  const sourceRange = transcriptTimeRange(words);

  const withSilence = sourceRange ? [...discarded, ...silenceSpans(segments, discarded, sourceRange)] : discarded;
  withSilence.sort((a, b) => a.word_start - b.word_start || (a.start_ts ?? 0) - (b.start_ts ?? 0));

  const speakers = [...new Set(segments.map((s) => s.speaker_id).filter((id) => id !== UNKNOWN_SPEAKER))].sort();

  return {
    source_time_range: sourceRange,
    segments,
    discarded: withSilence,
    speakers,
    unknown_speaker_segments: segments.filter((s) => s.speaker_id === UNKNOWN_SPEAKER).map((s) => s.index),
  };
}

/** Earliest start to latest end over every word with usable timing, kept or discarded. */
export function transcriptTimeRange(words: readonly WordTiming[]): TimeRange | null {
  const timed = words.filter(hasValidTiming);
  if (timed.length === 0) return null;
  return {
    start_ts: Math.min(...timed.map((w) => w.start_ts)),
    end_ts: Math.max(...timed.map((w) => w.end_ts)),
  };
}

function collectDiscarded(
  words: readonly WordTiming[],
  reasons: ReadonlyArray<DiscardReason | null>,
  family: LanguageFamily,
): DiscardedSpan[] {
  const spans: DiscardedSpan[] = [];
  let i = 0;
  while (i < words.length) {
    const reason = reasons[i];
    if (reason === null) {
      i++;
      continue;
    }
    const start = i;
    while (i < words.length && reasons[i] === reason) i++;

    const timed = words.slice(start, i).filter(hasValidTiming);
    spans.push({
      word_start: start,
      word_end: i,
      start_ts: timed.length > 0 ? Math.min(...timed.map((w) => w.start_ts)) : null,
      end_ts: timed.length > 0 ? Math.max(...timed.map((w) => w.end_ts)) : null,
      text: joinWords(words.slice(start, i).map((w) => w.word.trim()), family),
      reason,
    });
  }
  return spans;
}

function unitText(unit: Unit, words: readonly WordTiming[], family: LanguageFamily): string {
  return joinWords(unit.indices.map((i) => words[i].word.trim()), family);
}

function unitStart(unit: Unit, words: readonly WordTiming[]): number {
  return words[unit.indices[0]].start_ts;
}

function unitEnd(unit: Unit, words: readonly WordTiming[]): number {
  return words[unit.indices[unit.indices.length - 1]].end_ts;
}

function adjacent(a: Unit, b: Unit): boolean {
  return a.speaker === b.speaker && a.indices[a.indices.length - 1] + 1 === b.indices[0];
}

/**
 * Filler-only groups fold into the previous group of the same speaker.
 * A group ending in an incomplete ending absorbs the next group when the pause
 * is SHORT, unless that next group is filler-only (filler folding wins).
 * Neither rule joins across a LONG pause or across a discarded word.
 */
function applyMergeRules(
  units: readonly Unit[],
  words: readonly WordTiming[],
  family: LanguageFamily,
  rules: SegmentationRules,
): Unit[] {
  const merged: Unit[] = [];
  let i = 0;
  while (i < units.length) {
    const unit = units[i];
    const previous = merged[merged.length - 1];

    if (
      previous &&
      isFillerOnly(unitText(unit, words, family), family) &&
      adjacent(previous, unit) &&
      unitStart(unit, words) - unitEnd(previous, words) < rules.longPauseSeconds
    ) {
      merged[merged.length - 1] = { speaker: previous.speaker, indices: [...previous.indices, ...unit.indices] };
      i++;
      continue;
    }

    const next = units[i + 1];
    if (
      next &&
      !isFillerOnly(unitText(next, words, family), family) &&
      adjacent(unit, next) &&
      hasIncompleteEnding(unitText(unit, words, family), family) &&
      unitStart(next, words) - unitEnd(unit, words) < rules.shortPauseSeconds
    ) {
      merged.push({ speaker: unit.speaker, indices: [...unit.indices, ...next.indices] });
      i += 2;
      continue;
    }

    merged.push(unit);
    i++;
  }
  return merged;
}

/** Greedy split so no piece runs longer than `maxSeconds` (a single word always fits). */
function splitLongUnit(unit: Unit, words: readonly WordTiming[], maxSeconds: number): Unit[] {
  if (unitEnd(unit, words) - unitStart(unit, words) <= maxSeconds) {
    return [unit];
  }
  const pieces: Unit[] = [];
  let piece: number[] = [];
  for (const i of unit.indices) {
    if (piece.length > 0 && words[i].end_ts - words[piece[0]].start_ts > maxSeconds) {
      pieces.push({ speaker: unit.speaker, indices: piece });
      piece = [];
    }
    piece.push(i);
  }
  if (piece.length > 0) pieces.push({ speaker: unit.speaker, indices: piece });
  return pieces;
}

/** Empty-range "silence" spans for every gap in the source range not covered by a segment or timed discard. */
function silenceSpans(segments: readonly Segment[], discarded: readonly DiscardedSpan[], range: TimeRange): DiscardedSpan[] {
  const covered: Array<{ start: number; end: number; wordStart: number }> = [
    ...segments.map((s) => ({ start: s.start_ts, end: s.end_ts, wordStart: s.transcript_span.word_start })),
    ...discarded.flatMap((d) =>
      d.start_ts !== null && d.end_ts !== null ? [{ start: d.start_ts, end: d.end_ts, wordStart: d.word_start }] : [],
    ),
  ].sort((a, b) => a.start - b.start);

  const gaps: DiscardedSpan[] = [];
  let cursor = range.start_ts;
  for (const item of covered) {
    if (item.start > cursor && cursor < range.end_ts) {
      const end = Math.min(item.start, range.end_ts);
      gaps.push({
        word_start: item.wordStart,
        word_end: item.wordStart,
        start_ts: cursor,
        end_ts: end,
        text: "",
        reason: "silence",
      });
    }
    cursor = Math.max(cursor, item.end);
  }
  return gaps;
}

// ─── Verification ───────────────────────────────────────────────────────────────

/**
 * Check the coverage invariant. Returns every problem found; an empty list
 * means the segmentation may be committed.
 */
export function verifySegmentCoverage(result: SegmentationResult, words: readonly WordTiming[]): string[] {
  const issues: string[] = [];
  const wordCount = words.length;

  const owner = new Array<number>(wordCount).fill(0);
  const claim = (start: number, end: number, what: string) => {
    if (start > end || start < 0 || end > wordCount) {
      issues.push(`${what} has invalid word range [${start}, ${end})`);
      return;
    }
    for (let i = start; i < end; i++) owner[i]++;
  };
  result.segments.forEach((s) => claim(s.transcript_span.word_start, s.transcript_span.word_end, `segment ${s.index}`));
  result.discarded.forEach((d, i) => claim(d.word_start, d.word_end, `discarded span ${i}`));
  owner.forEach((count, i) => {
    if (count !== 1) issues.push(`word ${i} is covered ${count} times`);
  });

  result.segments.forEach((s, i) => {
    if (s.index !== i) issues.push(`segment at position ${i} has index ${s.index}`);
    if (s.end_ts < s.start_ts) issues.push(`segment ${i} ends before it starts`);
    const next = result.segments[i + 1];
    if (next && next.start_ts < s.end_ts) issues.push(`segments ${i} and ${i + 1} overlap`);
  });

  const range = transcriptTimeRange(words);
  const declared = result.source_time_range;
  if (
    (range === null) !== (declared === null) ||
    (range !== null && declared !== null && (range.start_ts !== declared.start_ts || range.end_ts !== declared.end_ts))
  ) {
    issues.push(`source time range ${formatRange(declared)} does not match the transcript's ${formatRange(range)}`);
  }
  if (range === null) {
    if (result.segments.length > 0) issues.push("segments present but the transcript has no timed words");
    return issues;
  }

  const intervals = [
    ...result.segments.map((s) => [s.start_ts, s.end_ts] as const),
    ...result.discarded.flatMap((d) => (d.start_ts !== null && d.end_ts !== null ? [[d.start_ts, d.end_ts] as const] : [])),
  ].sort((a, b) => a[0] - b[0]);

  let cursor = range.start_ts;
  for (const [start, end] of intervals) {
    if (start > cursor && cursor < range.end_ts) {
      issues.push(`time range [${cursor}, ${Math.min(start, range.end_ts)}) is not covered`);
    }
    cursor = Math.max(cursor, end);
  }
  if (cursor < range.end_ts) {
    issues.push(`time range [${cursor}, ${range.end_ts}) is not covered`);
  }

  return issues;
}

function formatRange(range: TimeRange | null): string {
  return range === null ? "none" : `[${range.start_ts}, ${range.end_ts})`;
}
