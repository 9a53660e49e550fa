// HSIE Evidence Pipeline - Linguistic analyzer (lexicon@1)
//
// Noisy-or over weighted lexicon terms found in the segment text:
// value = 1 - Π(1 - weight) over distinct matched terms.

import { readFile } from "node:fs/promises";
import { z } from "zod";
import type { Analyzer, AnalyzerInput, AnalyzerScore } from "./analyzers.js";
import { languageFamily } from "./segment-builder.js";
import { clamp01, roundMetric } from "./utils.js";

const LexiconSchema = z.object({
  en: z.array(z.object({ term: z.string().min(1), weight: z.number().min(0).max(1) })),
  ja: z.array(z.object({ term: z.string().min(1), weight: z.number().min(0).max(1) })),
});

export type Lexicon = z.infer<typeof LexiconSchema>;

export const DEFAULT_LEXICON_URL = new URL("../data/linguistic-lexicon.json", import.meta.url);

/** Segments with at least this many words are scored at full confidence. */
const FULL_CONFIDENCE_WORDS = 8;

export async function loadLexicon(source: URL | string = DEFAULT_LEXICON_URL): Promise<Lexicon> {
  const content = await readFile(source, "utf-8");
  return LexiconSchema.parse(JSON.parse(content));
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Distinct lexicon terms present in `text`. English matches on word boundaries, Japanese on substrings. */
export function matchTerms(text: string, lexicon: Lexicon, family: "en" | "ja"): Array<{ term: string; weight: number }> {
  if (family === "ja") {
    return lexicon.ja.filter((entry) => text.includes(entry.term));
  }
  const normalized = text.toLowerCase().replace(/[’‘]/g, "'");
  return lexicon.en.filter((entry) => new RegExp(`(^|[^a-z'])${escapeRegExp(entry.term)}($|[^a-z'])`).test(normalized));
}

export class LexiconLinguisticAnalyzer implements Analyzer {
  readonly kind = "Linguistic";
  readonly version = "lexicon@1";
  readonly requiresAudio = false;

  private lexicon: Promise<Lexicon> | null;

  /** Without an explicit lexicon, the bundled one is read on first use. */
  constructor(lexicon?: Lexicon) {
    this.lexicon = lexicon ? Promise.resolve(lexicon) : null;
  }

  async score(input: AnalyzerInput, _signal: AbortSignal): Promise<AnalyzerScore> {
    if (this.lexicon === null) {
      this.lexicon = loadLexicon();
    }
    const lexicon = await this.lexicon;

    const family = languageFamily(input.language);
    const matches = matchTerms(input.segment.transcript_span.text, lexicon, family);
    const value = 1 - matches.reduce((remaining, m) => remaining * (1 - m.weight), 1);

    const wordCount = input.segment.transcript_span.word_end - input.segment.transcript_span.word_start;
    return {
      value: roundMetric(clamp01(value)),
      confidence: roundMetric(Math.min(1, wordCount / FULL_CONFIDENCE_WORDS)),
    };
  }
}
