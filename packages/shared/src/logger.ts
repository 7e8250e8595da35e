export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug: (message: string, fields?: LogFields) => void;
  info: (message: string, fields?: LogFields) => void;
  warn: (message: string, fields?: LogFields) => void;
  error: (message: string, fields?: LogFields) => void;
  child: (fields: LogFields) => Logger;
}

const levelRank: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export function parseLogLevel(raw: string | undefined): LogLevel {
  const value = (raw ?? "").toLowerCase();
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  return "info";
}

export type LogSink = (line: string) => void;

const stdoutSink: LogSink = (line) => {
  process.stdout.write(`${line}\n`);
};

function write(sink: LogSink, level: LogLevel, message: string, fields: LogFields): void {
  const event = {
    ts: new Date().toISOString(),
    level,
    message,
    ...fields
  };
  sink(JSON.stringify(event));
}

export function createLogger(
  service: string,
  options: { level?: LogLevel; sink?: LogSink; fields?: LogFields } = {}
): Logger {
  const minRank = levelRank[options.level ?? parseLogLevel(process.env.LOG_LEVEL)];
  const sink = options.sink ?? stdoutSink;
  const bound: LogFields = { service, ...(options.fields ?? {}) };

  const emit = (level: LogLevel) => (message: string, fields?: LogFields): void => {
    if (levelRank[level] < minRank) {
      return;
    }
    write(sink, level, message, { ...bound, ...(fields ?? {}) });
  };

  return {
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
    child: (fields) =>
      createLogger(service, {
        level: options.level ?? parseLogLevel(process.env.LOG_LEVEL),
        sink,
        fields: { ...(options.fields ?? {}), ...fields }
      })
  };
}

export function createSilentLogger(): Logger {
  const noop = (): void => {};
  const logger: Logger = {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
    child: () => logger
  };
  return logger;
}
