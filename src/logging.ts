// ---------------------------------------------------------------------------
// Logging – tslog root logger, child loggers and the service log adapter
// ---------------------------------------------------------------------------
// Output goes to stderr: stdout belongs to whatever tool protocol hosts us.
// ---------------------------------------------------------------------------

import { inspect } from "node:util";
import { Logger, type ILogObj } from "tslog";

export type LogLevel = "debug" | "info" | "warn" | "error";

const MIN_LEVELS: Record<LogLevel, number> = {
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
};

/** Log shape injected into every service (mirrors the gateway service deps). */
export type ServiceLog = {
  debug: (msg: string) => void;
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
};

export function parseLogLevel(raw: string | undefined): LogLevel {
  const value = raw?.trim().toLowerCase();
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  return "info";
}

function formatArg(arg: unknown): string {
  return typeof arg === "string" ? arg : inspect(arg, { depth: 4, breakLength: Infinity });
}

let rootLogger: Logger<ILogObj> | null = null;

function createRootLogger(level: LogLevel): Logger<ILogObj> {
  return new Logger<ILogObj>({
    name: "alpaca-bridge",
    type: "pretty",
    minLevel: MIN_LEVELS[level],
    overwrite: {
      transportFormatted: (logMetaMarkup: string, logArgs: unknown[], logErrors: string[]) => {
        const parts = [logMetaMarkup + logArgs.map(formatArg).join(" "), ...logErrors];
        process.stderr.write(`${parts.join("\n")}\n`);
      },
    },
  });
}

export function getRootLogger(): Logger<ILogObj> {
  if (!rootLogger) {
    rootLogger = createRootLogger(parseLogLevel(process.env.ALPACA_LOG_LEVEL));
  }
  return rootLogger;
}

/** Re-create the root logger at a new level. Existing children keep theirs. */
export function setLogLevel(level: LogLevel): void {
  rootLogger = createRootLogger(level);
}

export function getChildLogger(bindings: { module: string }): Logger<ILogObj> {
  return getRootLogger().getSubLogger({ name: bindings.module });
}

export function toServiceLog(logger: Logger<ILogObj>): ServiceLog {
  return {
    debug: (msg) => {
      logger.debug(msg);
    },
    info: (msg) => {
      logger.info(msg);
    },
    warn: (msg) => {
      logger.warn(msg);
    },
    error: (msg) => {
      logger.error(msg);
    },
  };
}

export function formatError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
