// HSIE Evidence Pipeline - Audio metadata
//
// Reads an audio file once, fingerprints it, and pulls what it can from the
// container header. Only RIFF/WAVE headers are parsed; other formats get
// size and hash only.

import { readFile, stat } from "node:fs/promises";
import { basename, extname, resolve } from "node:path";
import { fileURLToPath, pathToFileURL } from "node:url";
import { IntegrityError, TranscriptionError } from "./errors.js";
import type { AudioSourceRef } from "./types.js";
import { sha256Hex } from "./utils.js";

/** Formats the OpenAI transcription endpoint accepts. */
export const SUPPORTED_AUDIO_FORMATS: readonly string[] = [
  "flac",
  "m4a",
  "mp3",
  "mp4",
  "mpeg",
  "mpga",
  "oga",
  "ogg",
  "wav",
  "webm",
];

export interface WavInfo {
  audioFormat: number; // 1 = PCM
  channels: number;
  sampleRate: number;
  byteRate: number;
  blockAlign: number;
  bitsPerSample: number;
  dataOffset: number;
  dataLength: number;
  durationSeconds: number;
}

/** An audio file loaded into memory together with its reference metadata. */
export interface LoadedAudio {
  ref: AudioSourceRef;
  fileName: string;
  bytes: Buffer;
  wav: WavInfo | null;
}

/**
 * Parse a RIFF/WAVE header. Returns null when the buffer is not a WAV file or
 * lacks a `fmt ` or `data` chunk.
 */
export function parseWavHeader(bytes: Buffer): WavInfo | null {
  if (bytes.length < 12 || bytes.toString("ascii", 0, 4) !== "RIFF" || bytes.toString("ascii", 8, 12) !== "WAVE") {
    return null;
  }

  let fmt: Omit<WavInfo, "dataOffset" | "dataLength" | "durationSeconds"> | null = null;
  let offset = 12;

  while (offset + 8 <= bytes.length) {
    const chunkId = bytes.toString("ascii", offset, offset + 4);
    const chunkSize = bytes.readUInt32LE(offset + 4);
    const body = offset + 8;

    if (chunkId === "fmt " && body + 16 <= bytes.length) {
      fmt = {
        audioFormat: bytes.readUInt16LE(body),
        channels: bytes.readUInt16LE(body + 2),
        sampleRate: bytes.readUInt32LE(body + 4),
        byteRate: bytes.readUInt32LE(body + 8),
        blockAlign: bytes.readUInt16LE(body + 12),
        bitsPerSample: bytes.readUInt16LE(body + 14),
      };
    } else if (chunkId === "data") {
      if (!fmt || fmt.byteRate === 0) {
        return null;
      }
      // Streaming writers leave the size at 0 or 0xFFFFFFFF; trust the file length then.
      const dataLength = Math.min(chunkSize, bytes.length - body);
      return {
        ...fmt,
        dataOffset: body,
        dataLength,
        durationSeconds: dataLength / fmt.byteRate,
      };
    }

    // Chunks are word-aligned.
    offset = body + chunkSize + (chunkSize % 2);
  }

  return null;
}

export function describeChannels(channels: number): string {
  if (channels === 1) return "mono";
  if (channels === 2) return "stereo";
  return `${channels}ch`;
}

export function audioFormatOf(path: string): string | null {
  const ext = extname(path).slice(1).toLowerCase();
  return ext.length > 0 ? ext : null;
}

/**
 * Load an audio file and describe it.
 * @throws TranscriptionError (`audio_unreadable`) when the file is missing, not a file, or empty.
 */
export async function loadAudio(path: string): Promise<LoadedAudio> {
  const absolute = resolve(path);

  let bytes: Buffer;
  try {
    const info = await stat(absolute);
    if (!info.isFile()) {
      throw new Error("not a regular file");
    }
    bytes = await readFile(absolute);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new TranscriptionError("audio_unreadable", `Cannot read audio ${absolute}: ${detail}`, undefined, {
      cause: err,
    });
  }

  if (bytes.length === 0) {
    throw new TranscriptionError("audio_unreadable", `Audio file ${absolute} is empty`);
  }

  const wav = parseWavHeader(bytes);

  return {
    fileName: basename(absolute),
    bytes,
    wav,
    ref: {
      uri: pathToFileURL(absolute).href,
      sha256: sha256Hex(bytes),
      byte_length: bytes.length,
      format: audioFormatOf(absolute),
      duration_seconds: wav ? wav.durationSeconds : null,
      sample_rate: wav ? wav.sampleRate : null,
      channels: wav ? describeChannels(wav.channels) : null,
    },
  };
}

/**
 * Re-load the audio a Raw Evidence points at and check it is byte-identical to
 * what was captured.
 * @throws IntegrityError when the file's hash no longer matches the reference.
 */
export async function loadSourceAudio(ref: AudioSourceRef): Promise<LoadedAudio> {
  let audio: LoadedAudio;
  try {
    audio = await loadAudio(fileURLToPath(ref.uri));
  } catch (err) {
    if (err instanceof TranscriptionError) {
      // Surfaces in whichever stage re-reads the audio.
      throw new TranscriptionError(err.reason, err.message, { stage: "store", evidenceId: null }, { cause: err });
    }
    throw err;
  }
  if (audio.ref.sha256 !== ref.sha256) {
    throw new IntegrityError(
      `Audio at ${ref.uri} changed since capture (sha256 ${audio.ref.sha256}, expected ${ref.sha256})`,
      { stage: "store", evidenceId: null },
    );
  }
  return audio;
}
