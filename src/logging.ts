export type LogLevel = "debug" | "info" | "warn" | "error";

export type Logger = Record<LogLevel, (...args: unknown[]) => void>;

/** Where log lines end up; `console` in the CLI, a recorder in tests. */
export type LogSink = Pick<Console, "debug" | "log" | "warn" | "error">;

const LEVEL_TAGS: Record<LogLevel, string> = {
  debug: "[DEBUG]",
  info: "[INFO]",
  warn: "[WARN]",
  error: "[ERROR]",
};

// The tag joins the first string argument so printf-style placeholders still apply.
function tagged(tag: string, args: unknown[]): unknown[] {
  const [first, ...rest] = args;
  return typeof first === "string" ? [`${tag} ${first}`, ...rest] : [tag, ...args];
}

export function createLogger(debugEnabled: boolean, sink: LogSink = console): Logger {
  return {
    debug: (...args: unknown[]) => {
      if (debugEnabled) {
        sink.debug(...tagged(LEVEL_TAGS.debug, args));
      }
    },
    info: (...args: unknown[]) => {
      sink.log(...tagged(LEVEL_TAGS.info, args));
    },
    warn: (...args: unknown[]) => {
      sink.warn(...tagged(LEVEL_TAGS.warn, args));
    },
    error: (...args: unknown[]) => {
      sink.error(...tagged(LEVEL_TAGS.error, args));
    },
  };
}

export function createSilentLogger(): Logger {
  const noop = () => undefined;
  return { debug: noop, info: noop, warn: noop, error: noop };
}

let activeLogger: Logger = createLogger(false);

export function setLogger(logger: Logger): void {
  activeLogger = logger;
}

export function getLogger(): Logger {
  return activeLogger;
}
