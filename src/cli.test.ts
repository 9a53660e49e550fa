import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { access, mkdtemp, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { AnalysisStage } from "./analysis-stage.js";
import { AnalyzerRegistry } from "./analyzers.js";
import { formatLineage, formatScore, parseArgs, runCli, UsageError, type CliDeps } from "./cli.js";
import { parseConfig } from "./config.js";
import { SingleSpeakerDiarizer } from "./diarizer.js";
import { EntryStage } from "./entry-stage.js";
import { EvidenceStore, type VerificationIssue } from "./evidence-store.js";
import { AggregationStage, DEFAULT_WEIGHTING } from "./hsi-aggregator.js";
import { silentLogger } from "./logger.js";
import { EvidencePipeline } from "./pipeline.js";
import { PreprocessingStage } from "./preprocessing-stage.js";
import type { EvidenceServer } from "./server.js";
import { commitChain, FIXED_DATE, makeWav, words } from "./test-helpers.js";
import type { TranscriptResult } from "./transcription-adapter.js";

// ─── Test Helpers ───────────────────────────────────────────────────────────────

const TRANSCRIPT: TranscriptResult = {
  text: "you never listen",
  word_timings: words(["you", 0, 0.3], ["never", 0.35, 0.7], ["listen", 0.75, 1.2]),
  chunks: [{ index: 0, start_ts: 0, end_ts: 1.2, text: "you never listen", word_start: 0, word_end: 3 }],
  overall_confidence: 0.92,
  language: "en",
  engine: "openai",
  model: "whisper-1",
  timing_precision: "word",
};

class BrokenStore extends EvidenceStore {
  override async verify(): Promise<VerificationIssue[]> {
    return [{ id: "deadbeef", problem: "content hashes to cafef00d" }];
  }
}

function createHarness(store = new EvidenceStore({ logger: silentLogger, now: () => FIXED_DATE })) {
  const out: string[] = [];
  const err: string[] = [];
  const judge = vi.fn().mockResolvedValue({ value: 0.6, confidence: 1 });

  const buildPipeline = (): EvidencePipeline => {
    const registry = new AnalyzerRegistry().register({
      kind: "Semantic",
      version: "judge@1",
      requiresAudio: false,
      score: judge,
    });
    return new EvidencePipeline({
      store,
      entry: new EntryStage({
        store,
        adapter: { transcribe: vi.fn().mockResolvedValue(TRANSCRIPT) },
        logger: silentLogger,
        now: () => FIXED_DATE,
        newCaptureId: () => "capture-test",
      }),
      preprocessing: new PreprocessingStage({
        store,
        diarizer: new SingleSpeakerDiarizer(),
        confidenceThreshold: 0.6,
        logger: silentLogger,
      }),
      analysis: new AnalysisStage({ store, registry, logger: silentLogger }),
      aggregation: new AggregationStage({ store, logger: silentLogger }),
      selection: { kinds: ["Semantic"] },
      weighting: DEFAULT_WEIGHTING,
      logger: silentLogger,
    });
  };

  const deps: CliDeps = {
    io: { out: (text) => out.push(text), err: (text) => err.push(text) },
    env: {},
    sink: { info: vi.fn(), warn: vi.fn(), error: vi.fn() },
    loadConfig: async () => parseConfig({}),
    openStore: async () => store,
    buildPipeline,
    now: () => FIXED_DATE,
  };
  return { store, out, err, judge, deps };
}

let dir: string;
let audioPath: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "hsie-cli-"));
  audioPath = join(dir, "meeting.wav");
  await writeFile(audioPath, makeWav(2, 8000, () => 200));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

// ─── parseArgs ──────────────────────────────────────────────────────────────────

describe("parseArgs", () => {
  it("should read a command, its target and options", () => {
    expect(parseArgs(["run", "a.wav", "--session", "s1", "--language", "ja"])).toEqual({
      command: "run",
      target: "a.wav",
      outDir: "exports",
      sessionId: "s1",
      language: "ja",
    });
    expect(parseArgs(["analyze", "abc", "--analyzers", "Semantic, Linguistic"]).analyzers).toEqual([
      "Semantic",
      "Linguistic",
    ]);
    expect(parseArgs(["serve", "--port", "0"]).port).toBe(0);
    expect(parseArgs(["export", "abc", "--out", "bundles"]).outDir).toBe("bundles");
  });

  it("should fall back to help with no arguments or --help", () => {
    expect(parseArgs([]).command).toBe("help");
    expect(parseArgs(["show", "abc", "--help"]).command).toBe("help");
  });

  it("should reject malformed input with a usage error", () => {
    const cases: Array<[string[], string]> = [
      [["show", "--config"], "--config needs a value"],
      [["serve", "--port", "70000"], '--port must be an integer between 0 and 65535, got "70000"'],
      [["analyze", "abc", "--analyzers", "Prosody"], "--analyzers takes a comma-separated subset of Acoustic,Semantic,Linguistic"],
      [["show", "abc", "--force"], "Unknown option --force"],
      [["explode"], 'Unknown command "explode"'],
      [["show"], "show needs an argument"],
      [["verify", "extra"], "verify takes no argument"],
      [["show", "a", "b"], 'Unexpected argument "b"'],
    ];
    for (const [argv, message] of cases) {
      expect(() => parseArgs(argv)).toThrow(UsageError);
      expect(() => parseArgs(argv)).toThrow(message);
    }
  });
});

// ─── Formatting ─────────────────────────────────────────────────────────────────

describe("formatScore", () => {
  it("should print the Scored id and the full HSIScore as JSON", async () => {
    const store = new EvidenceStore({ logger: silentLogger });
    const { analyzed } = await commitChain(store);
    const scoredEvidence = await new AggregationStage({ store, logger: silentLogger }).aggregate(analyzed.id, {
      ...DEFAULT_WEIGHTING,
      weights: { Acoustic: 0, Semantic: 1, Linguistic: 0 },
    });

    const [id, ...json] = formatScore(scoredEvidence).split("\n");
    const hsi: unknown = JSON.parse(json.join("\n"));

    expect(id).toBe(scoredEvidence.id);
    expect(hsi).toEqual(JSON.parse(JSON.stringify(scoredEvidence.payload.hsi)));
    expect(hsi).toMatchObject({
      value: 0.8,
      excluded: [{ segment_index: 0, analyzer: "Linguistic", reason: "zero_weight" }],
      weighting: { weights: { Acoustic: 0, Semantic: 1, Linguistic: 0 } },
    });
  });
});

describe("formatLineage", () => {
  it("should print one aligned line per record", async () => {
    const store = new EvidenceStore({ logger: silentLogger, now: () => FIXED_DATE });
    const { raw, preprocessed } = await commitChain(store);

    expect(formatLineage([raw, preprocessed])).toBe(
      [
        `Raw          ${raw.id} test 2025-03-04T09:15:30.000Z`,
        `Preprocessed ${preprocessed.id} test 2025-03-04T09:15:30.000Z`,
      ].join("\n"),
    );
  });
});

// ─── runCli ─────────────────────────────────────────────────────────────────────

describe("runCli", () => {
  it("should print usage for help and exit 2 on usage errors", async () => {
    const { out, err, deps } = createHarness();

    expect(await runCli(["--help"], deps)).toBe(0);
    expect(out[0]).toContain("Usage:");

    expect(await runCli(["explode"], deps)).toBe(2);
    expect(err[0].split("\n")[0]).toBe('Unknown command "explode"');
  });

  it("should run the whole pipeline and print the four ids one per line", async () => {
    const { store, out, deps } = createHarness();

    expect(await runCli(["run", audioPath, "--session", "s1"], deps)).toBe(0);

    const ids = out[0].split("\n");
    expect(ids).toHaveLength(4);
    expect((await store.lineage(ids[3])).map((e) => e.id)).toEqual(ids);
  });

  it("should run stages one at a time by id", async () => {
    const { store, out, deps } = createHarness();

    await runCli(["capture", audioPath], deps);
    await runCli(["preprocess", out[0]], deps);
    await runCli(["analyze", out[1], "--analyzers", "Semantic"], deps);
    await runCli(["score", out[2]], deps);

    expect((await store.getAs(out[1], "Preprocessed")).parent_id).toBe(out[0]);
    expect((await store.getAs(out[2], "Analyzed")).payload.analyzer_set).toEqual([
      { kind: "Semantic", version: "judge@1" },
    ]);
    const [scoredId, ...json] = out[3].split("\n");
    expect((await store.getAs(scoredId, "Scored")).parent_id).toBe(out[2]);
    expect(JSON.parse(json.join("\n"))).toMatchObject({ value: 0.6, extended_value: 0.6 });
    expect(store.size).toBe(4);
  });

  it("should report a pipeline error and exit 1", async () => {
    const { err, deps } = createHarness();
    const store = new EvidenceStore({ logger: silentLogger });
    const { preprocessed } = await commitChain(store);
    const harness = createHarness(store);

    expect(await runCli(["analyze", preprocessed.id, "--analyzers", "Semantic,Linguistic"], harness.deps)).toBe(1);
    expect(harness.err).toEqual(["ConfigurationError [stage=config] [evidence=-]: No Linguistic analyzer (available: none)"]);

    const id = "0".repeat(64);
    expect(await runCli(["show", id], deps)).toBe(1);
    expect(err).toEqual([`NotFoundError [stage=store] [evidence=${id}]: Evidence ${id} not found`]);
  });

  it("should report anything else as an unexpected error", async () => {
    const { err, deps } = createHarness();

    expect(await runCli(["verify"], { ...deps, loadConfig: () => Promise.reject(new Error("boom")) })).toBe(1);
    expect(err).toEqual(["Unexpected error: boom"]);
  });

  it("should show a record and its lineage", async () => {
    const store = new EvidenceStore({ logger: silentLogger, now: () => FIXED_DATE });
    const { raw, analyzed } = await commitChain(store);
    const { out, deps } = createHarness(store);

    await runCli(["show", raw.id], deps);
    await runCli(["lineage", analyzed.id], deps);

    expect(JSON.parse(out[0])).toEqual(JSON.parse(JSON.stringify(raw)));
    expect(out[1]).toBe(formatLineage(await store.lineage(analyzed.id)));
  });

  it("should verify the store", async () => {
    const store = new EvidenceStore({ logger: silentLogger });
    await commitChain(store);
    const ok = createHarness(store);

    expect(await runCli(["verify"], ok.deps)).toBe(0);
    expect(ok.out).toEqual(["OK: 3 records verified"]);

    const broken = createHarness(new BrokenStore({ logger: silentLogger }));
    expect(await runCli(["verify"], broken.deps)).toBe(1);
    expect(broken.out).toEqual(["deadbeef: content hashes to cafef00d"]);
  });

  it("should export an audit bundle", async () => {
    const store = new EvidenceStore({ logger: silentLogger });
    const { analyzed } = await commitChain(store);
    const { out, deps } = createHarness(store);
    const outDir = join(dir, "exports");

    expect(await runCli(["export", analyzed.id, "--out", outDir], deps)).toBe(0);

    const paths = out[0].split("\n");
    expect(paths.map((p) => p.slice(p.lastIndexOf("/") + 1))).toEqual(["lineage.json", "transcript.txt"]);
    for (const path of paths) {
      expect(path.startsWith(outDir)).toBe(true);
      await access(path);
    }
  });

  it("should serve the store and hand the server to the caller", async () => {
    const { out, deps } = createHarness();
    const served: EvidenceServer[] = [];

    expect(await runCli(["serve", "--port", "0"], { ...deps, onServe: (s) => served.push(s) })).toBe(0);

    try {
      const match = /^Serving evidence on http:\/\/localhost:(\d+)$/.exec(out[0]);
      expect(match).not.toBeNull();
      const response = await fetch(`http://127.0.0.1:${match?.[1]}/health`);
      expect(response.status).toBe(200);
    } finally {
      await served[0]?.close();
    }
  });
});
