// HSIE Evidence Pipeline - File Persistence
//
// FileEvidenceBackend: one pretty-printed `<id>.json` per Evidence under a store
// directory. Records are written to a temp file and hard-linked into place, so a
// reader never sees a partial record and an existing record is never overwritten.
//
// Audit export: writes the full lineage of one Evidence into a timestamped
// directory next to a readable transcript and the score, for hand-off to a reviewer.

import { link, mkdir, readdir, readFile, unlink, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { EvidenceBackend, EvidenceReader, PersistOutcome } from "./evidence-store.js";
import { isEvidenceKind } from "./evidence-store.js";
import type { Evidence, PreprocessedPayload, RawPayload } from "./types.js";

const RECORD_FILE = /^[0-9a-f]{64}\.json$/;

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

export class FileEvidenceBackend implements EvidenceBackend {
  readonly name = "file";
  private readonly dir: string;
  private tempCounter = 0;

  constructor(dir: string) {
    this.dir = dir;
  }

  async loadAll(): Promise<unknown[]> {
    let entries: string[];
    try {
      entries = await readdir(this.dir);
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") {
        return [];
      }
      throw err;
    }

    const records: unknown[] = [];
    for (const entry of entries.filter((name) => RECORD_FILE.test(name)).sort()) {
      const content = await readFile(join(this.dir, entry), "utf-8");
      const record: unknown = JSON.parse(content);
      records.push(record);
    }
    return records;
  }

  async persist(id: string, record: Evidence): Promise<PersistOutcome> {
    await mkdir(this.dir, { recursive: true });

    const target = join(this.dir, `${id}.json`);
    const temp = join(this.dir, `.${id}.${process.pid}.${this.tempCounter++}.tmp`);
    await writeFile(temp, JSON.stringify(record, null, 2) + "\n", "utf-8");

    try {
      await link(temp, target);
      return "written";
    } catch (err) {
      if (isErrnoException(err) && err.code === "EEXIST") {
        return "exists";
      }
      throw err;
    } finally {
      await unlink(temp);
    }
  }
}

// ─── Audit export ───────────────────────────────────────────────────────────────

/**
 * Formats a number of seconds into `[MM:SS]` timestamp format.
 */
export function formatTimestamp(seconds: number): string {
  const totalSeconds = Math.max(0, Math.floor(seconds));
  const minutes = Math.floor(totalSeconds / 60);
  const secs = totalSeconds % 60;
  return `[${String(minutes).padStart(2, "0")}:${String(secs).padStart(2, "0")}]`;
}

/**
 * Renders diarized segments as `[MM:SS] speaker: text`, one per line.
 */
export function formatSegmentTranscript(payload: PreprocessedPayload): string {
  return payload.segments
    .map((segment) => `${formatTimestamp(segment.start_ts)} ${segment.speaker_id}: ${segment.transcript_span.text}`)
    .join("\n");
}

/** Undiarized fallback: the ASR chunks as `[MM:SS] text`. */
export function formatRawTranscript(payload: RawPayload): string {
  return payload.asr_chunks.map((chunk) => `${formatTimestamp(chunk.start_ts)} ${chunk.text}`).join("\n");
}

/**
 * Generates the export directory name.
 * Format: `{YYYY-MM-DD_HH-mm-ss}_{first 12 hex chars of the id}`
 */
export function buildDirectoryName(evidenceId: string, date: Date = new Date()): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  const hours = String(date.getHours()).padStart(2, "0");
  const minutes = String(date.getMinutes()).padStart(2, "0");
  const seconds = String(date.getSeconds()).padStart(2, "0");

  const timestamp = `${year}-${month}-${day}_${hours}-${minutes}-${seconds}`;
  return `${timestamp}_${evidenceId.slice(0, 12)}`;
}

/**
 * Writes an audit bundle for `evidenceId`:
 *   {outDir}/{YYYY-MM-DD_HH-mm-ss}_{id prefix}/
 *     lineage.json     every record from Raw down to the requested one
 *     transcript.txt   diarized when a Preprocessed layer is in the chain
 *     score.json       only when the chain ends in a Scored layer
 *
 * @returns Array of file paths that were written.
 */
export async function exportLineageBundle(
  store: EvidenceReader,
  evidenceId: string,
  outDir: string,
  now: Date = new Date(),
): Promise<string[]> {
  const chain = await store.lineage(evidenceId);
  const dirPath = join(outDir, buildDirectoryName(evidenceId, now));
  await mkdir(dirPath, { recursive: true });

  const savedPaths: string[] = [];

  const lineagePath = join(dirPath, "lineage.json");
  await writeFile(lineagePath, JSON.stringify(chain, null, 2) + "\n", "utf-8");
  savedPaths.push(lineagePath);

  let transcript = "";
  for (const evidence of chain) {
    if (isEvidenceKind(evidence, "Raw")) {
      transcript = formatRawTranscript(evidence.payload);
    } else if (isEvidenceKind(evidence, "Preprocessed")) {
      transcript = formatSegmentTranscript(evidence.payload);
    }
  }
  const transcriptPath = join(dirPath, "transcript.txt");
  await writeFile(transcriptPath, transcript, "utf-8");
  savedPaths.push(transcriptPath);

  const last = chain[chain.length - 1];
  if (last && isEvidenceKind(last, "Scored")) {
    const scorePath = join(dirPath, "score.json");
    await writeFile(scorePath, JSON.stringify(last.payload.hsi, null, 2) + "\n", "utf-8");
    savedPaths.push(scorePath);
  }

  return savedPaths;
}
