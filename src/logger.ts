/**
 * Shared pino logger.
 *
 * Pretty output is used on a TTY (or with LOG_PRETTY=true); otherwise the
 * logger writes newline-delimited JSON so the watcher can run under a
 * process supervisor.
 */
import { pino, type Logger } from "pino";

export type { Logger };

export interface LoggerOptions {
  level?: string;
  pretty?: boolean;
  name?: string;
}

function envPretty(): boolean | undefined {
  const raw = (process.env.LOG_PRETTY || "").trim().toLowerCase();
  if (!raw) return undefined;
  return ["1", "true", "yes", "on"].includes(raw);
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level || process.env.LOG_LEVEL || "info";
  const pretty = options.pretty ?? envPretty() ?? Boolean(process.stdout.isTTY);
  if (pretty) {
    return pino({
      name: options.name,
      level,
      transport: {
        target: "pino-pretty",
        options: { colorize: true, translateTime: "SYS:standard" },
      },
    });
  }
  return pino({ name: options.name, level });
}

/**
 * Logger that drops everything; used when a component is built without one.
 */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
