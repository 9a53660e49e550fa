// HSIE Evidence Pipeline - Diarizer collaborators
//
// A diarizer answers "who spoke when" as a list of speaker turns. The
// preprocessing stage maps transcript words onto those turns; diarizers never
// see or change the transcript text.

import type { PrerecordedSchema } from "@deepgram/sdk";
import type { LoadedAudio } from "./audio-metadata.js";
import { isPipelineError, TranscriptionError } from "./errors.js";
import { createLogger, type PipelineLogger } from "./logger.js";
import type { WordTiming } from "./types.js";
import { clamp01, roundMetric } from "./utils.js";

export interface SpeakerTurn {
  start_ts: number;
  end_ts: number;
  speaker_id: string;
  confidence: number;
}

export interface DiarizationResult {
  engine: string;
  model: string | null;
  turns: SpeakerTurn[];
}

export interface DiarizeInput {
  /** Null when the diarizer does not need the audio (see `requiresAudio`). */
  audio: LoadedAudio | null;
  words: readonly WordTiming[];
}

export interface Diarizer {
  readonly requiresAudio: boolean;
  diarize(input: DiarizeInput): Promise<DiarizationResult>;
}

// ─── Single speaker ─────────────────────────────────────────────────────────────

/**
 * One turn spanning every word, at full confidence. For recordings known to
 * carry a single voice, or when no diarization engine is configured.
 */
export class SingleSpeakerDiarizer implements Diarizer {
  readonly requiresAudio = false;
  private readonly speakerId: string;

  constructor(speakerId: string = "speaker_0") {
    this.speakerId = speakerId;
  }

  async diarize(input: DiarizeInput): Promise<DiarizationResult> {
    const timed = input.words.filter((w) => Number.isFinite(w.start_ts) && Number.isFinite(w.end_ts));
    if (timed.length === 0) {
      return { engine: "single-speaker", model: null, turns: [] };
    }
    const start = Math.min(...timed.map((w) => w.start_ts));
    const end = Math.max(...timed.map((w) => w.end_ts));
    return {
      engine: "single-speaker",
      model: null,
      turns: [{ start_ts: start, end_ts: end, speaker_id: this.speakerId, confidence: 1 }],
    };
  }
}

// ─── Deepgram ───────────────────────────────────────────────────────────────────

/**
 * Shape of a Deepgram pre-recorded response, limited to the fields we read.
 * Defined locally to avoid tight coupling with SDK internals.
 */
export interface DeepgramPrerecordedResponse {
  results?: {
    channels: Array<{
      alternatives: Array<{
        words?: Array<{
          word: string;
          start: number;
          end: number;
          confidence: number;
          speaker?: number;
          speaker_confidence?: number;
        }>;
      }>;
    }>;
  };
}

/** The slice of the Deepgram client used for pre-recorded diarization. */
export interface DeepgramPrerecordedClient {
  listen: {
    prerecorded: {
      transcribeFile(
        source: Buffer,
        options: PrerecordedSchema,
      ): Promise<{ result: DeepgramPrerecordedResponse | null; error: { message: string } | null }>;
    };
  };
}

export interface DeepgramDiarizerOptions {
  model?: string;
  language?: string;
  logger?: PipelineLogger;
}

/**
 * Sends the audio to Deepgram's pre-recorded API with `diarize: true` and
 * collapses runs of same-speaker words into turns. A turn's confidence is the
 * mean speaker confidence of its words.
 */
export class DeepgramDiarizer implements Diarizer {
  readonly requiresAudio = true;
  private readonly client: DeepgramPrerecordedClient;
  private readonly model: string;
  private readonly language: string | undefined;
  private readonly logger: PipelineLogger;

  constructor(client: DeepgramPrerecordedClient, options: DeepgramDiarizerOptions = {}) {
    this.client = client;
    this.model = options.model ?? "nova-2";
    this.language = options.language;
    this.logger = options.logger ?? createLogger("DeepgramDiarizer");
  }

  async diarize(input: DiarizeInput): Promise<DiarizationResult> {
    if (!input.audio) {
      throw new TranscriptionError("audio_unreadable", "Deepgram diarization needs the source audio", {
        stage: "preprocessing",
        evidenceId: null,
      });
    }

    let response: Awaited<ReturnType<DeepgramPrerecordedClient["listen"]["prerecorded"]["transcribeFile"]>>;
    try {
      response = await this.client.listen.prerecorded.transcribeFile(input.audio.bytes, {
        model: this.model,
        diarize: true,
        punctuate: false,
        ...(this.language ? { language: this.language } : {}),
      });
    } catch (err) {
      if (isPipelineError(err)) {
        throw err;
      }
      const detail = err instanceof Error ? err.message : String(err);
      throw new TranscriptionError(
        "engine_failure",
        `Deepgram diarization failed: ${detail}`,
        { stage: "preprocessing", evidenceId: null },
        { cause: err },
      );
    }

    if (response.error || !response.result) {
      throw new TranscriptionError(
        "engine_failure",
        `Deepgram diarization failed: ${response.error?.message ?? "empty response"}`,
        { stage: "preprocessing", evidenceId: null },
      );
    }

    const words = response.result.results?.channels[0]?.alternatives[0]?.words ?? [];
    const turns = wordsToTurns(words);
    this.logger.info(`Diarized ${words.length} words into ${turns.length} turns`);
    return { engine: "deepgram", model: this.model, turns };
  }
}

type DiarizedWord = NonNullable<
  NonNullable<DeepgramPrerecordedResponse["results"]>["channels"][number]["alternatives"][number]["words"]
>[number];

export function wordsToTurns(words: readonly DiarizedWord[]): SpeakerTurn[] {
  const turns: SpeakerTurn[] = [];
  let current: { speaker: number; start: number; end: number; confidences: number[] } | null = null;

  const flush = () => {
    if (!current) return;
    const mean = current.confidences.reduce((sum, c) => sum + c, 0) / current.confidences.length;
    turns.push({
      start_ts: current.start,
      end_ts: current.end,
      speaker_id: `speaker_${current.speaker}`,
      confidence: roundMetric(clamp01(mean)),
    });
  };

  for (const word of words) {
    const speaker = word.speaker ?? 0;
    const confidence = word.speaker_confidence ?? word.confidence;
    if (current && current.speaker === speaker) {
      current.end = Math.max(current.end, word.end);
      current.confidences.push(confidence);
    } else {
      flush();
      current = { speaker, start: word.start, end: word.end, confidences: [confidence] };
    }
  }
  flush();

  return turns;
}
