import type { LogLevel } from "./types";

export const LOG_LEVELS: readonly LogLevel[] = [
  "silent",
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
];

export function isLogLevel(value: unknown): value is LogLevel {
  return (
    typeof value === "string" &&
    LOG_LEVELS.some((level) => level === value)
  );
}

/**
 * Level selected by a repeatable `-v` flag: one occurrence enables debug
 * output, two or more enable trace output.
 */
export function verbosityToLevel(count: number): LogLevel {
  if (count >= 2) {
    return "trace";
  }
  return count === 1 ? "debug" : "info";
}
