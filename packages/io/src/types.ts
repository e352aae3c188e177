export type LogLevel =
  | "silent"
  | "fatal"
  | "error"
  | "warn"
  | "info"
  | "debug"
  | "trace";

export interface LoggingDestination {
  type: "stdout" | "stderr";
  pretty?: boolean;
  colorize?: boolean;
}

export interface LoggingConfig {
  level?: LogLevel;
  destination?: LoggingDestination;
}
