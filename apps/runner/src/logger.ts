export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];
export type LogMeta = Record<string, unknown>;

export type Logger = {
  debug: (msg: string, meta?: LogMeta) => void;
  info: (msg: string, meta?: LogMeta) => void;
  warn: (msg: string, meta?: LogMeta) => void;
  error: (msg: string, meta?: LogMeta) => void;
};

export function createLogger(
  options: { level?: LogLevel; write?: (line: string) => void; now?: () => number } = {}
): Logger {
  const minRank = LOG_LEVELS.indexOf(options.level ?? "info");
  const write = options.write ?? ((line: string) => console.log(line));
  const now = options.now ?? Date.now;

  function log(level: LogLevel, msg: string, meta?: LogMeta) {
    if (LOG_LEVELS.indexOf(level) < minRank) return;
    const entry = {
      level,
      msg,
      time: now(),
      ...(meta ?? {})
    };
    // JSON line for log collectors / Docker logs
    write(JSON.stringify(entry));
  }

  return {
    debug: (msg, meta) => log("debug", msg, meta),
    info: (msg, meta) => log("info", msg, meta),
    warn: (msg, meta) => log("warn", msg, meta),
    error: (msg, meta) => log("error", msg, meta)
  };
}

export const silentLogger: Logger = createLogger({ write: () => undefined });
