/**
 * Console logger. Everything goes to stderr: stdout carries the stdio
 * transport's JSON-RPC stream.
 */

export type Logger = {
  error: (message: string, ...data: unknown[]) => void;
  warn: (message: string, ...data: unknown[]) => void;
  info: (message: string, ...data: unknown[]) => void;
  debug: (message: string, ...data: unknown[]) => void;
};

type ConsoleLevel = keyof Logger;

/** Level label, padded so messages line up. */
const LABELS: Record<ConsoleLevel, string> = {
  error: "ERROR ❌".padEnd(10),
  warn: "WARNING ⚠️".padEnd(10),
  info: "INFO".padEnd(10),
  debug: "DEBUG".padEnd(10),
};

function write(level: ConsoleLevel, message: string, data: unknown[]): void {
  const line = `${new Date().toISOString()}: ${LABELS[level]}: ${message}`;
  if (data.length > 0) {
    console.error(line, ...data);
  } else {
    console.error(line);
  }
}

export function create_logger(): Logger {
  return {
    error: (message, ...data) => write("error", message, data),
    warn: (message, ...data) => write("warn", message, data),
    info: (message, ...data) => write("info", message, data),
    debug: (message, ...data) => write("debug", message, data),
  };
}
