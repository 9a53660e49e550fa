import { describe, it, expect, vi } from "vitest";
import type { AnalyzerInput } from "./analyzers.js";
import { buildJudgePrompt, OpenAIJudgeSemanticAnalyzer, type OpenAIChatClient } from "./semantic-analyzer.js";
import { makeSegment } from "./test-helpers.js";

// ─── Test Helpers ─────────────────────────────────────────────────────────────

function createMockChatClient(content: string | null) {
  const createSpy = vi.fn().mockResolvedValue({ choices: [{ message: { content } }] });
  const client: OpenAIChatClient = { chat: { completions: { create: createSpy } } };
  return { client, createSpy };
}

function input(overrides: Partial<AnalyzerInput> = {}): AnalyzerInput {
  return {
    segment: makeSegment(1, "speaker_1", 2, 3, "you never listen", 2, 5),
    previous: makeSegment(0, "speaker_0", 0, 1, "where is the report", 0, 2),
    next: null,
    language: "en",
    words: [],
    audio: null,
    ...overrides,
  };
}

const signal = new AbortController().signal;

// ─── Tests ────────────────────────────────────────────────────────────────────

describe("buildJudgePrompt", () => {
  it("should label the target and its neighbours with their speakers", () => {
    const prompt = buildJudgePrompt(
      input({ next: makeSegment(2, "speaker_0", 4, 5, "fine", 5, 6) }),
    );
    expect(prompt).toBe(
      [
        "Language: en",
        "BEFORE (speaker_0): where is the report",
        "TARGET (speaker_1): you never listen",
        "AFTER (speaker_0): fine",
      ].join("\n"),
    );
  });

  it("should omit missing context", () => {
    expect(buildJudgePrompt(input({ previous: null, language: null }))).toBe("TARGET (speaker_1): you never listen");
  });
});

describe("OpenAIJudgeSemanticAnalyzer", () => {
  it("should ask for deterministic JSON and return the judged values", async () => {
    const { client, createSpy } = createMockChatClient('{"hostility": 0.65, "confidence": 0.8}');
    const analyzer = new OpenAIJudgeSemanticAnalyzer(client);

    const score = await analyzer.score(input(), signal);

    expect(score).toEqual({ value: 0.65, confidence: 0.8 });
    expect(createSpy).toHaveBeenCalledWith(
      expect.objectContaining({
        model: "gpt-4o-mini",
        response_format: { type: "json_object" },
        temperature: 0,
      }),
      { signal },
    );
  });

  it("should use the configured model", async () => {
    const { client, createSpy } = createMockChatClient('{"hostility": 0, "confidence": 1}');
    await new OpenAIJudgeSemanticAnalyzer(client, { model: "gpt-4o" }).score(input(), signal);
    expect(createSpy).toHaveBeenCalledWith(expect.objectContaining({ model: "gpt-4o" }), { signal });
  });

  it("should pass out-of-range values through for the stage to judge", async () => {
    const { client } = createMockChatClient('{"hostility": 1.4, "confidence": 0.9}');
    expect(await new OpenAIJudgeSemanticAnalyzer(client).score(input(), signal)).toEqual({
      value: 1.4,
      confidence: 0.9,
    });
  });

  it("should reject an empty response", async () => {
    const { client } = createMockChatClient(null);
    await expect(new OpenAIJudgeSemanticAnalyzer(client).score(input(), signal)).rejects.toThrow(
      "LLM returned empty response",
    );
  });

  it("should reject text that is not JSON", async () => {
    const { client } = createMockChatClient("I think it is rude");
    await expect(new OpenAIJudgeSemanticAnalyzer(client).score(input(), signal)).rejects.toThrow(
      "Failed to parse LLM response as JSON: I think it is rude",
    );
  });

  it("should reject JSON without numeric fields", async () => {
    const { client } = createMockChatClient('{"hostility": "high"}');
    await expect(new OpenAIJudgeSemanticAnalyzer(client).score(input(), signal)).rejects.toThrow(
      /no numeric hostility\/confidence/,
    );
  });
});
