// HSIE Evidence Pipeline - Acoustic analyzer (energy-rate@1)
//
// Loudness of the segment relative to the whole recording, combined with
// speech rate. Reads 16-bit PCM WAV samples directly; any other container
// fails the (segment, Acoustic) pair.

import type { WavInfo } from "./audio-metadata.js";
import type { Analyzer, AnalyzerInput, AnalyzerScore } from "./analyzers.js";
import { clamp01, roundMetric } from "./utils.js";

const LOUDNESS_WEIGHT = 0.6;
const RATE_WEIGHT = 0.4;
/** Words per second considered calm; the rate component starts above this. */
const CALM_WORDS_PER_SECOND = 2;
/** Words per second above calm at which the rate component saturates. */
const RATE_SPAN = 3;
/** Segments shorter than this get proportionally lower confidence. */
const FULL_CONFIDENCE_SECONDS = 2;

/**
 * Compute RMS energy of a 16-bit signed little-endian PCM buffer.
 * Returns 0 for empty buffers.
 */
export function computeChunkRMS(chunk: Buffer): number {
  const sampleCount = Math.floor(chunk.length / 2);
  if (sampleCount === 0) return 0;
  let sumSquares = 0;
  for (let i = 0; i < sampleCount; i++) {
    const sample = chunk.readInt16LE(i * 2);
    sumSquares += sample * sample;
  }
  return Math.sqrt(sumSquares / sampleCount);
}

/** The PCM bytes between two timestamps, aligned to whole frames. */
export function sliceSamples(bytes: Buffer, wav: WavInfo, start: number, end: number): Buffer {
  const frameOf = (t: number) => Math.max(0, Math.floor(t * wav.sampleRate));
  const dataEnd = wav.dataOffset + wav.dataLength;
  const from = Math.min(dataEnd, wav.dataOffset + frameOf(start) * wav.blockAlign);
  const to = Math.min(dataEnd, wav.dataOffset + frameOf(end) * wav.blockAlign);
  return bytes.subarray(from, Math.max(from, to));
}

export class EnergyRateAcousticAnalyzer implements Analyzer {
  readonly kind = "Acoustic";
  readonly version = "energy-rate@1";
  readonly requiresAudio = true;

  // Whole-recording RMS, computed once per loaded audio buffer.
  private readonly fileRms = new WeakMap<Buffer, number>();

  async score(input: AnalyzerInput, _signal: AbortSignal): Promise<AnalyzerScore> {
    const audio = input.audio;
    const wav = audio?.wav ?? null;
    if (!audio || !wav) {
      throw new Error("acoustic analysis needs WAV audio");
    }
    if (wav.audioFormat !== 1 || wav.bitsPerSample !== 16) {
      throw new Error(`acoustic analysis needs 16-bit PCM (got format ${wav.audioFormat}, ${wav.bitsPerSample} bits)`);
    }

    let reference = this.fileRms.get(audio.bytes);
    if (reference === undefined) {
      reference = computeChunkRMS(audio.bytes.subarray(wav.dataOffset, wav.dataOffset + wav.dataLength));
      this.fileRms.set(audio.bytes, reference);
    }

    const { segment } = input;
    const duration = Math.max(0, segment.end_ts - segment.start_ts);
    const segmentRms = computeChunkRMS(sliceSamples(audio.bytes, wav, segment.start_ts, segment.end_ts));

    // Ratio 1 (as loud as the recording's average) maps to 0.5.
    const loudness = reference > 0 ? clamp01(segmentRms / (2 * reference)) : 0;

    const wordCount = segment.transcript_span.word_end - segment.transcript_span.word_start;
    const wordsPerSecond = duration > 0 ? wordCount / duration : 0;
    const rate = clamp01((wordsPerSecond - CALM_WORDS_PER_SECOND) / RATE_SPAN);

    return {
      value: roundMetric(clamp01(LOUDNESS_WEIGHT * loudness + RATE_WEIGHT * rate)),
      confidence: roundMetric(Math.min(1, duration / FULL_CONFIDENCE_SECONDS)),
    };
  }
}
