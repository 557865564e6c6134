export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/** Receives formatted log lines. Defaults to stderr so stdout stays free for command output. */
export type LogSink = (level: Exclude<LogLevel, "silent">, line: string) => void;

const stderrSink: LogSink = (_level, line) => {
  process.stderr.write(`${line}\n`);
};

let currentLevel: LogLevel = "info";
let sink: LogSink = stderrSink;

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

/** Replace the output sink. Pass nothing to restore stderr. */
export function setLogSink(next?: LogSink): void {
  sink = next ?? stderrSink;
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

function formatMsg(level: LogLevel, msg: string, data?: Record<string, unknown>): string {
  const ts = new Date().toISOString();
  const base = `${ts} [${level.toUpperCase()}] ${msg}`;
  if (data && Object.keys(data).length > 0) {
    return `${base} ${JSON.stringify(data)}`;
  }
  return base;
}

function emit(level: Exclude<LogLevel, "silent">, msg: string, data?: Record<string, unknown>): void {
  if (shouldLog(level)) sink(level, formatMsg(level, msg, data));
}

export const log = {
  debug(msg: string, data?: Record<string, unknown>): void {
    emit("debug", msg, data);
  },
  info(msg: string, data?: Record<string, unknown>): void {
    emit("info", msg, data);
  },
  warn(msg: string, data?: Record<string, unknown>): void {
    emit("warn", msg, data);
  },
  error(msg: string, data?: Record<string, unknown>): void {
    emit("error", msg, data);
  },
};
