/**
 * Minimal leveled logger.
 *
 * Everything goes to stderr: stdout is reserved for the MCP stdio transport,
 * and the MCP client (e.g. Claude Desktop) surfaces stderr in its logs.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function parseLogLevel(value: string | undefined): LogLevel {
  switch (value?.toLowerCase()) {
    case "debug":
      return "debug";
    case "warn":
      return "warn";
    case "error":
      return "error";
    default:
      return "info";
  }
}

// Applies until main installs the configured level
let threshold: LogLevel = parseLogLevel(process.env.LOG_LEVEL);

/** Set the threshold for every logger, including ones already created. */
export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function createLogger(scope: string): Logger {
  const write = (level: LogLevel, message: string) => {
    if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) return;
    process.stderr.write(
      `[mail-assistant] ${new Date().toISOString()} ${level.toUpperCase()} ${scope}: ${message}\n`
    );
  };

  return {
    debug: (message) => write("debug", message),
    info: (message) => write("info", message),
    warn: (message) => write("warn", message),
    error: (message) => write("error", message),
  };
}
