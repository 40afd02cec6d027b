import type { LoggerPort, LogMeta } from "../../ports/sys/LoggerPort";

type Level = "debug" | "info" | "warn" | "error";

function log(level: Level, message: string, meta?: LogMeta) {
  const payload = meta && Object.keys(meta).length ? `${message} ${JSON.stringify(meta)}` : message;
  const line = `[apb] ${level.toUpperCase()} ${payload}`;
  // stdout is reserved for command output
  switch (level) {
    case "warn":
      return console.warn(line);
    default:
      return console.error(line);
  }
}

export class ConsoleLogger implements LoggerPort {
  constructor(private readonly verbose = false) {}

  debug(message: string, meta?: LogMeta): void {
    if (this.verbose) log("debug", message, meta);
  }
  info(message: string, meta?: LogMeta): void {
    if (this.verbose) log("info", message, meta);
  }
  warn(message: string, meta?: LogMeta): void {
    log("warn", message, meta);
  }
  error(message: string, meta?: LogMeta): void {
    log("error", message, meta);
  }
}
