// HSIE Evidence Pipeline - Logging
//
// Console-backed, tagged log lines: `[LEVEL] [Component] message`.
// Components receive a PipelineLogger so tests can inject a silent or spying one.

export interface PipelineLogger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export type LogLevel = "silent" | "error" | "warn" | "info";

const LEVEL_RANK: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
};

export interface LogSink {
  info(line: string, ...args: unknown[]): void;
  warn(line: string, ...args: unknown[]): void;
  error(line: string, ...args: unknown[]): void;
}

export const consoleSink: LogSink = {
  info: (line, ...args) => console.log(line, ...args),
  warn: (line, ...args) => console.warn(line, ...args),
  error: (line, ...args) => console.error(line, ...args),
};

/** Every level on stderr, so stdout carries only command results. */
export const stderrSink: LogSink = {
  info: (line, ...args) => console.error(line, ...args),
  warn: (line, ...args) => console.error(line, ...args),
  error: (line, ...args) => console.error(line, ...args),
};

export interface LoggerOptions {
  level?: LogLevel;
  sink?: LogSink;
}

export function createLogger(component: string, options: LoggerOptions = {}): PipelineLogger {
  const threshold = LEVEL_RANK[options.level ?? "info"];
  const sink = options.sink ?? consoleSink;
  const enabled = (level: Exclude<LogLevel, "silent">) => LEVEL_RANK[level] <= threshold;

  return {
    info: (msg, ...args) => {
      if (enabled("info")) sink.info(`[INFO] [${component}] ${msg}`, ...args);
    },
    warn: (msg, ...args) => {
      if (enabled("warn")) sink.warn(`[WARN] [${component}] ${msg}`, ...args);
    },
    error: (msg, ...args) => {
      if (enabled("error")) sink.error(`[ERROR] [${component}] ${msg}`, ...args);
    },
  };
}

export const silentLogger: PipelineLogger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};
