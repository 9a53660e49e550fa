// HSIE Evidence Pipeline - Command line interface
//
// Results go to stdout, logs and error reports to stderr. Exit codes:
//   0 success
//   1 pipeline error (reported as `Kind [stage=..] [evidence=..]: message`)
//   2 usage error

import { buildPipeline, openStore } from "./bootstrap.js";
import { loadConfig, type HsieConfig } from "./config.js";
import { ConfigurationError, describeError, isPipelineError } from "./errors.js";
import type { EvidenceStore } from "./evidence-store.js";
import { exportLineageBundle } from "./file-persistence.js";
import { createLogger, stderrSink, type LogSink } from "./logger.js";
import type { EvidencePipeline, PipelineRun } from "./pipeline.js";
import { createEvidenceServer, type EvidenceServer } from "./server.js";
import { ANALYZER_KINDS, type AnalyzerKind, type Evidence, type ScoredEvidence } from "./types.js";

export const CLI_NAME = "hsie";

const USAGE = `
Usage: ${CLI_NAME} <command> [options]

Commands:
  capture <audio>       Transcribe an audio file into Raw evidence
  preprocess <id>       Diarize and segment Raw evidence
  analyze <id>          Score Preprocessed evidence with the analyzer set
  score <id>            Aggregate Analyzed evidence; prints the HSIScore as JSON
  run <audio>           capture → preprocess → analyze → score; prints the four ids
  resume <id>           Run the stages missing after any evidence id
  show <id>             Print one evidence record as JSON
  lineage <id>          Print the chain from Raw down to <id>
  verify                Re-hash every stored record and check lineage
  export <id>           Write an audit bundle for <id>
  serve                 Serve stored evidence over HTTP (read-only)

Options:
  --config <path>       JSON config file (default: $HSIE_CONFIG)
  --session <id>        Session id recorded with a capture
  --language <code>     Language hint for transcription (e.g. en, ja)
  --analyzers <a,b>     Analyzer kinds for analyze (Acoustic,Semantic,Linguistic)
  --out <dir>           Output directory for export (default: exports)
  --port <n>            Port for serve (default: config port)
  --help                Show this help message
`;

export type CliCommand =
  | "capture"
  | "preprocess"
  | "analyze"
  | "score"
  | "run"
  | "resume"
  | "show"
  | "lineage"
  | "verify"
  | "export"
  | "serve";

const COMMANDS: readonly CliCommand[] = [
  "capture",
  "preprocess",
  "analyze",
  "score",
  "run",
  "resume",
  "show",
  "lineage",
  "verify",
  "export",
  "serve",
];

const NEEDS_ARGUMENT: ReadonlySet<CliCommand> = new Set(["capture", "preprocess", "analyze", "score", "run", "resume", "show", "lineage", "export"]);

export interface CliArgs {
  command: CliCommand | "help";
  target: string | null;
  configPath?: string;
  sessionId?: string;
  language?: string;
  analyzers?: AnalyzerKind[];
  outDir: string;
  port?: number;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

function isCommand(value: string): value is CliCommand {
  return COMMANDS.some((c) => c === value);
}

function isAnalyzerKind(value: string): value is AnalyzerKind {
  return ANALYZER_KINDS.some((k) => k === value);
}

/** Parses everything after the executable and script name. */
export function parseArgs(argv: readonly string[]): CliArgs {
  const positional: string[] = [];
  const args: CliArgs = { command: "help", target: null, outDir: "exports" };

  const valueOf = (flag: string, next: string | undefined): string => {
    if (next === undefined || next.startsWith("--")) {
      throw new UsageError(`${flag} needs a value`);
    }
    return next;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];

    switch (arg) {
      case "--help":
      case "-h":
        return { ...args, command: "help" };
      case "--config":
        args.configPath = valueOf(arg, next);
        i++;
        break;
      case "--session":
        args.sessionId = valueOf(arg, next);
        i++;
        break;
      case "--language":
        args.language = valueOf(arg, next);
        i++;
        break;
      case "--out":
        args.outDir = valueOf(arg, next);
        i++;
        break;
      case "--port": {
        const port = Number(valueOf(arg, next));
        if (!Number.isInteger(port) || port < 0 || port > 65535) {
          throw new UsageError(`--port must be an integer between 0 and 65535, got "${next}"`);
        }
        args.port = port;
        i++;
        break;
      }
      case "--analyzers": {
        const kinds = valueOf(arg, next)
          .split(",")
          .map((k) => k.trim())
          .filter((k) => k.length > 0);
        const unknown = kinds.filter((k) => !isAnalyzerKind(k));
        if (kinds.length === 0 || unknown.length > 0) {
          throw new UsageError(`--analyzers takes a comma-separated subset of ${ANALYZER_KINDS.join(",")}`);
        }
        args.analyzers = kinds.filter(isAnalyzerKind);
        i++;
        break;
      }
      default:
        if (arg.startsWith("--")) {
          throw new UsageError(`Unknown option ${arg}`);
        }
        positional.push(arg);
    }
  }

  if (positional.length === 0) {
    return args;
  }

  const [command, target, ...rest] = positional;
  if (!isCommand(command)) {
    throw new UsageError(`Unknown command "${command}"`);
  }
  if (NEEDS_ARGUMENT.has(command) && target === undefined) {
    throw new UsageError(`${command} needs an argument`);
  }
  if (!NEEDS_ARGUMENT.has(command) && target !== undefined) {
    throw new UsageError(`${command} takes no argument`);
  }
  if (rest.length > 0) {
    throw new UsageError(`Unexpected argument "${rest[0]}"`);
  }

  return { ...args, command, target: target ?? null };
}

// ─── Output formatting ──────────────────────────────────────────────────────────

/** The Scored id, then the full HSIScore (components, exclusions and weighting included). */
export function formatScore(scored: ScoredEvidence): string {
  return `${scored.id}\n${JSON.stringify(scored.payload.hsi, null, 2)}`;
}

export function formatLineage(chain: readonly Evidence[]): string {
  return chain.map((e) => `${e.version_kind.padEnd(12)} ${e.id} ${e.producer} ${e.created_at}`).join("\n");
}

/** The four ids of the chain, Raw first, one per line. */
export function formatRun(run: PipelineRun): string {
  return [run.raw.id, run.preprocessed.id, run.analyzed.id, run.scored.id].join("\n");
}

// ─── Runner ─────────────────────────────────────────────────────────────────────

export interface CliIO {
  out(text: string): void;
  err(text: string): void;
}

export interface CliDeps {
  io?: CliIO;
  env?: NodeJS.ProcessEnv;
  sink?: LogSink;
  loadConfig?: (configPath: string | undefined, env: NodeJS.ProcessEnv) => Promise<HsieConfig>;
  openStore?: (config: HsieConfig) => Promise<EvidenceStore>;
  buildPipeline?: (config: HsieConfig, store: EvidenceStore) => EvidencePipeline;
  /** Receives the started server, so callers can close it. */
  onServe?: (server: EvidenceServer) => void;
  now?: () => Date;
}

const processIO: CliIO = {
  out: (text) => process.stdout.write(text + "\n"),
  err: (text) => process.stderr.write(text + "\n"),
};

export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const io = deps.io ?? processIO;
  const env = deps.env ?? process.env;
  const sink = deps.sink ?? stderrSink;

  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (err) {
    if (err instanceof UsageError) {
      io.err(`${err.message}\n${USAGE}`);
      return 2;
    }
    throw err;
  }

  if (args.command === "help") {
    io.out(USAGE);
    return 0;
  }

  try {
    const config = await (deps.loadConfig ?? ((configPath, e) => loadConfig({ configPath, env: e })))(args.configPath, env);
    const store = await (deps.openStore ?? ((c) => openStore(c, { sink })))(config);
    const pipeline = () => (deps.buildPipeline ?? ((c, s) => buildPipeline(c, s, { env, sink })))(config, store);
    const target = args.target ?? "";

    switch (args.command) {
      case "capture": {
        const raw = await pipeline().capture(target, {
          sessionId: args.sessionId,
          language: args.language ?? config.language ?? undefined,
        });
        io.out(raw.id);
        break;
      }
      case "preprocess":
        io.out((await pipeline().preprocess(target)).id);
        break;
      case "analyze": {
        const selection = args.analyzers ? { ...config.selection, kinds: args.analyzers } : undefined;
        io.out((await pipeline().analyze(target, selection)).id);
        break;
      }
      case "score": {
        const scored = await pipeline().aggregate(target);
        io.out(formatScore(scored));
        break;
      }
      case "run": {
        const run = await pipeline().run(target, {
          sessionId: args.sessionId,
          language: args.language ?? config.language ?? undefined,
        });
        io.out(formatRun(run));
        break;
      }
      case "resume":
        io.out(formatRun(await pipeline().resume(target)));
        break;
      case "show":
        io.out(JSON.stringify(await store.get(target), null, 2));
        break;
      case "lineage":
        io.out(formatLineage(await store.lineage(target)));
        break;
      case "verify": {
        const issues = await store.verify();
        if (issues.length > 0) {
          for (const issue of issues) {
            io.out(`${issue.id}: ${issue.problem}`);
          }
          return 1;
        }
        io.out(`OK: ${store.size} records verified`);
        break;
      }
      case "export": {
        const paths = await exportLineageBundle(store, target, args.outDir, deps.now?.());
        io.out(paths.join("\n"));
        break;
      }
      case "serve": {
        const server = createEvidenceServer({
          store,
          logger: createLogger("Server", { level: config.logLevel, sink }),
        });
        const port = await server.listen(args.port ?? config.port);
        io.out(`Serving evidence on http://localhost:${port}`);
        deps.onServe?.(server);
        break;
      }
    }
    return 0;
  } catch (err) {
    if (isPipelineError(err)) {
      io.err(err.toReport());
      return 1;
    }
    if (err instanceof Error && "code" in err && err.code === "EADDRINUSE") {
      io.err(new ConfigurationError(err.message, { stage: "cli", evidenceId: null }).toReport());
      return 1;
    }
    io.err(`Unexpected error: ${describeError(err)}`);
    return 1;
  }
}
