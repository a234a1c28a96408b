export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  error(msg: string, meta?: LogMeta): void;
  /** Returns a logger that adds `bindings` to every line it writes. */
  child(bindings: LogMeta): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  pretty?: boolean;
  /** Override output sink, e.g. to capture lines in tests. Defaults to console.log. */
  output?: (line: string) => void;
}

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export function createLogger(options: LoggerOptions = {}): Logger {
  const {
    level = "info",
    pretty = process.env.NODE_ENV !== "production",
    output = console.log,
  } = options;

  return build(LEVEL_RANK[level], pretty, output, {});
}

function build(
  minRank: number,
  pretty: boolean,
  output: (line: string) => void,
  bindings: LogMeta,
): Logger {
  function write(msgLevel: LogLevel, msg: string, meta?: LogMeta) {
    if (LEVEL_RANK[msgLevel] < minRank) return;
    const ts = new Date().toISOString();
    const fields = { ...bindings, ...meta };
    const hasFields = Object.keys(fields).length > 0;
    if (pretty) {
      const metaStr = hasFields
        ? " " + Object.entries(fields).map(([k, v]) => `${k}=${JSON.stringify(v)}`).join(" ")
        : "";
      output(`[${ts}] ${msgLevel.toUpperCase().padEnd(5)} ${msg}${metaStr}`);
    } else {
      output(JSON.stringify({ ts, level: msgLevel, msg, ...fields }));
    }
  }

  return {
    debug: (msg, meta) => write("debug", msg, meta),
    info: (msg, meta) => write("info", msg, meta),
    warn: (msg, meta) => write("warn", msg, meta),
    error: (msg, meta) => write("error", msg, meta),
    child: (extra) => build(minRank, pretty, output, { ...bindings, ...extra }),
  };
}

/** A logger that drops everything. */
export const silentLogger: Logger = createLogger({ level: "error", output: () => {} });

/** Render an unknown thrown value for log metadata. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
