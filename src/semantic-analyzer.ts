// HSIE Evidence Pipeline - Semantic analyzer (openai-judge@1)
//
// Asks a chat model, in JSON mode at temperature 0, how hostile or degrading
// the utterance is given its immediate neighbours.

import { z } from "zod";
import type { Analyzer, AnalyzerInput, AnalyzerScore } from "./analyzers.js";
import { roundMetric } from "./utils.js";

/**
 * Minimal interface for the OpenAI chat completions API surface we use.
 * Allows injecting a mock client in tests without importing the full SDK.
 */
export interface OpenAIChatClient {
  chat: {
    completions: {
      create(
        params: {
          model: string;
          messages: Array<{ role: "system" | "user"; content: string }>;
          response_format?: { type: "json_object" };
          temperature?: number;
        },
        options?: { signal?: AbortSignal },
      ): Promise<{
        choices: Array<{
          message: {
            content: string | null;
          };
        }>;
      }>;
    };
  };
}

const JudgeResponseSchema = z.object({
  hostility: z.number(),
  confidence: z.number(),
});

const SYSTEM_PROMPT = `You rate one utterance from a transcribed workplace conversation.

Score how hostile, demeaning, threatening or degrading the TARGET utterance is toward another person, from 0 (neutral or friendly) to 1 (severe).
Use the surrounding utterances only as context; rate the TARGET alone.
Also give your confidence in the rating from 0 to 1. Short or ambiguous utterances deserve lower confidence.

Respond with ONLY a JSON object: {"hostility": <number>, "confidence": <number>}`;

export function buildJudgePrompt(input: AnalyzerInput): string {
  const line = (label: string, speaker: string, text: string) => `${label} (${speaker}): ${text}`;
  const parts: string[] = [];
  if (input.language) {
    parts.push(`Language: ${input.language}`);
  }
  if (input.previous) {
    parts.push(line("BEFORE", input.previous.speaker_id, input.previous.transcript_span.text));
  }
  parts.push(line("TARGET", input.segment.speaker_id, input.segment.transcript_span.text));
  if (input.next) {
    parts.push(line("AFTER", input.next.speaker_id, input.next.transcript_span.text));
  }
  return parts.join("\n");
}

export interface OpenAIJudgeOptions {
  model?: string;
}

export class OpenAIJudgeSemanticAnalyzer implements Analyzer {
  readonly kind = "Semantic";
  readonly version = "openai-judge@1";
  readonly requiresAudio = false;
  private readonly client: OpenAIChatClient;
  private readonly model: string;

  constructor(client: OpenAIChatClient, options: OpenAIJudgeOptions = {}) {
    this.client = client;
    this.model = options.model ?? "gpt-4o-mini";
  }

  async score(input: AnalyzerInput, signal: AbortSignal): Promise<AnalyzerScore> {
    const response = await this.client.chat.completions.create(
      {
        model: this.model,
        messages: [
          { role: "system", content: SYSTEM_PROMPT },
          { role: "user", content: buildJudgePrompt(input) },
        ],
        response_format: { type: "json_object" },
        temperature: 0,
      },
      { signal },
    );

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new Error("LLM returned empty response");
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (err) {
      throw new Error(`Failed to parse LLM response as JSON: ${content.slice(0, 200)}`, { cause: err });
    }

    const judged = JudgeResponseSchema.safeParse(parsed);
    if (!judged.success) {
      throw new Error(`LLM response has no numeric hostility/confidence: ${content.slice(0, 200)}`);
    }
    // Range is checked by the analysis stage, which records out-of-range scores as invalid.
    return { value: roundMetric(judged.data.hostility), confidence: roundMetric(judged.data.confidence) };
  }
}
