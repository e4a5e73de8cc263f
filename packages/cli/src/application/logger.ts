export type LogLevel = "silent" | "error" | "warn" | "info" | "debug";

type MessageLevel = Exclude<LogLevel, "silent">;

const logLevelRank: Readonly<Record<MessageLevel, number>> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

export type Logger = {
  error: (message: string) => void;
  warn: (message: string) => void;
  info: (message: string) => void;
  debug: (message: string) => void;
};

export type LogSink = (line: string) => void;

const noop = (): void => {};

export const createSilentLogger = (): Logger => ({
  error: noop,
  warn: noop,
  info: noop,
  debug: noop,
});

const writeToStderr: LogSink = (line) => {
  process.stderr.write(line);
};

export const createStderrLogger = (level: LogLevel, sink: LogSink = writeToStderr): Logger => {
  if (level === "silent") {
    return createSilentLogger();
  }

  const emitter = (messageLevel: MessageLevel) => (message: string) => {
    if (logLevelRank[messageLevel] <= logLevelRank[level]) {
      sink(`[readyscore] ${messageLevel.toUpperCase()} ${message}\n`);
    }
  };

  return {
    error: emitter("error"),
    warn: emitter("warn"),
    info: emitter("info"),
    debug: emitter("debug"),
  };
};

export const isLogLevel = (value: string | undefined): value is LogLevel =>
  value === "silent" || value === "error" || value === "warn" || value === "info" || value === "debug";

export const parseLogLevel = (value: string | undefined): LogLevel => (isLogLevel(value) ? value : "info");
